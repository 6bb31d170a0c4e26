import { Kind } from '../types';
import type {
  Failure,
  FailureInit,
  NonEmpty,
  Result,
  Success,
  SuccessChanges,
  ValidationError,
} from '../types';
import { assert_failure_kind, assert_success_kind } from './kind';

// 显式给出的字符串错误；errors 读取时据此决定是否投影 validation_errors
const explicit_errors = new WeakMap<Failure, readonly string[]>();

function build_success<T>(value: T, kind: Kind, message: string | undefined): Success<T> {
  return Object.freeze({
    ok: true as const,
    kind: assert_success_kind(kind),
    value,
    ...(message !== undefined ? { message } : {}),
  });
}

function build_failure(fields: {
  kind: Kind;
  title: string;
  detail: string | undefined;
  errors: readonly string[];
  validation_errors: readonly ValidationError[];
  trace_id: string | undefined;
}): Failure {
  const kind = assert_failure_kind(fields.kind);
  const own = Object.freeze([...fields.errors]);
  const validation_errors = Object.freeze([...fields.validation_errors]);

  const failure: Failure = Object.freeze({
    ok: false as const,
    kind,
    title: fields.title,
    ...(fields.detail !== undefined ? { detail: fields.detail } : {}),
    get errors(): readonly string[] {
      if (own.length > 0) return own;
      return validation_errors.map((ve) => ve.detail);
    },
    validation_errors,
    ...(fields.trace_id !== undefined ? { trace_id: fields.trace_id } : {}),
  });
  explicit_errors.set(failure, own);
  return failure;
}

/** 取失败结果中显式给出的字符串错误（不含投影） */
export function own_errors(failure: Failure): readonly string[] {
  return explicit_errors.get(failure) ?? failure.errors;
}

/* -------------------------------------------------------------------------- */
/*  成功                                                                       */
/* -------------------------------------------------------------------------- */

/**
 * 构造成功结果。
 * kind 必须落在成功区间，否则抛 KindRangeError。
 */
export function succeed(): Success<undefined>;
export function succeed<T>(value: T, kind?: Kind, message?: string): Success<T>;
export function succeed<T>(value?: T, kind: Kind = Kind.Ok, message?: string): Success<T | undefined> {
  return build_success(value, kind, message);
}

/** 只带一条消息的成功结果 */
export function succeed_message(message?: string, kind: Kind = Kind.Ok): Success<undefined> {
  return build_success(undefined, kind, message);
}

/* -------------------------------------------------------------------------- */
/*  失败                                                                       */
/* -------------------------------------------------------------------------- */

/**
 * 通用构造；未指定 kind 时，带校验问题的失败为 Invalid，其余为 Error。
 */
export function create_failure(init: FailureInit = {}): Failure {
  const validation_errors = init.validation_errors ?? [];
  return build_failure({
    kind: init.kind ?? (validation_errors.length > 0 ? Kind.Invalid : Kind.Error),
    title: init.title ?? '',
    detail: init.detail,
    errors: init.errors ?? [],
    validation_errors,
    trace_id: init.trace_id,
  });
}

/** 带标题与单条错误 */
export function fail(title: string, error: string, kind: Kind = Kind.Error): Failure {
  return create_failure({ title, errors: [error], kind });
}

/** 一条或多条字符串错误，标题为空 */
export function fail_errors(errors: NonEmpty<string>): Failure {
  return create_failure({ errors });
}

/**
 * 由校验问题构造失败。
 * 校验失败按定义就是输入非法，kind 恒为 Invalid。
 */
export function fail_validation(validation_errors: NonEmpty<ValidationError>, title = ''): Failure {
  return create_failure({ title, validation_errors, kind: Kind.Invalid });
}

/* -------------------------------------------------------------------------- */
/*  复制并修改                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * 复制成功结果并替换部分字段；显式给出 message: undefined 会清掉消息。
 */
export function with_success<T>(success: Success<T>, changes: SuccessChanges<T>): Success<T> {
  // 展开只覆盖 changes 中确实出现的键
  const { value, message } = { value: success.value, message: success.message, ...changes };
  return build_success(value, changes.kind ?? success.kind, message);
}

/**
 * 复制失败结果并替换部分字段。
 * errors 未给出时沿用原来显式给出的那一份，投影仍按新的 validation_errors 计算。
 */
export function with_failure(failure: Failure, changes: FailureInit): Failure {
  return build_failure({
    kind: changes.kind ?? failure.kind,
    title: changes.title ?? failure.title,
    detail: 'detail' in changes ? changes.detail : failure.detail,
    errors: changes.errors ?? own_errors(failure),
    validation_errors: changes.validation_errors ?? failure.validation_errors,
    trace_id: 'trace_id' in changes ? changes.trace_id : failure.trace_id,
  });
}

/** 只改 kind；越界立即抛出 */
export function with_kind<T>(result: Result<T>, kind: Kind): Result<T> {
  return result.ok ? with_success(result, { kind }) : with_failure(result, { kind });
}

/* -------------------------------------------------------------------------- */
/*  判别                                                                       */
/* -------------------------------------------------------------------------- */

export function is_success<T>(result: Result<T>): result is Success<T> {
  return result.ok;
}

export function is_failure<T>(result: Result<T>): result is Failure {
  return !result.ok;
}

export interface ResultHandlers<T, R> {
  success: (success: Success<T>) => R;
  failure: (failure: Failure) => R;
}

/** 两个分支都必须处理 */
export function match_result<T, R>(result: Result<T>, handlers: ResultHandlers<T, R>): R {
  return result.ok ? handlers.success(result) : handlers.failure(result);
}

/**
 * Failure → Result<T>。失败不带值，除此之外所有字段原样保留。
 */
export function into_result<T>(failure: Failure): Result<T> {
  return failure;
}
