import type { Kind, ValidationSeverity } from './kind.type';

/** 单个字段级校验问题（构造后不可变） */
export interface ValidationError {
  /** 出错原因，面向人类阅读。 */
  readonly detail: string;
  /** 出错字段的 JSON Pointer（如 "/items/0/price"），可由 pointer 模块生成。 */
  readonly pointer?: string;
  /** 严重程度，位标志；缺省为 Error。 */
  readonly severity?: ValidationSeverity;
  /** 领域内的错误码，格式自定。 */
  readonly code?: string;
}

/** ValidationError 的构造参数；severity 传 null 表示不带严重程度 */
export interface ValidationErrorInit {
  detail: string;
  pointer?: string;
  severity?: ValidationSeverity | null;
  code?: string;
}

/** 成功分支 */
export interface Success<T = undefined> {
  readonly ok: true;
  /** 只能落在成功区间（Ok / Created / NoContent / Accepted） */
  readonly kind: Kind;
  readonly value: T;
  readonly message?: string;
}

/** 失败分支：不携带值，因此对任意 T 都成立 */
export interface Failure {
  readonly ok: false;
  /** 只能落在失败区间 */
  readonly kind: Kind;
  /**
   * 问题类别的简短概述，同类问题之间保持不变。
   * 例：You do not have enough credit.
   */
  readonly title: string;
  /**
   * 本次问题的具体说明。
   * 例：Your current balance is 30, but that costs 50.
   */
  readonly detail?: string;
  /**
   * 字符串形式的错误列表（只用于展示）。
   * 未显式给出时，读取时由 validation_errors 的 detail 投影得到。
   */
  readonly errors: readonly string[];
  readonly validation_errors: readonly ValidationError[];
  /** 便于追踪失败来源 */
  readonly trace_id?: string;
}

export type Result<T = undefined> = Success<T> | Failure;

/** create_failure / with_failure 接受的字段 */
export interface FailureInit {
  title?: string;
  detail?: string;
  errors?: readonly string[];
  validation_errors?: readonly ValidationError[];
  trace_id?: string;
  kind?: Kind;
}

export interface SuccessChanges<T> {
  value?: T;
  message?: string;
  kind?: Kind;
}

/** 至少一个元素的只读列表 */
export type NonEmpty<T> = readonly [T, ...T[]];
