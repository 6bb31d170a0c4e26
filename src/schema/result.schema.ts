import { z } from 'zod';
import { Kind, VALIDATION_SEVERITY_MASK } from '../types';
import { is_failure_kind, is_success_kind, NON_ERROR_ON_FAILURE, NON_SUCCESS_ON_SUCCESS } from '../result/kind';

/**
 * Result 的 JSON 线上形状（字段名 camelCase；缺省字段直接省略，不写 null）。
 */

/** 单条校验问题 */
export const ValidationErrorWire = z.object({
  /** 出错原因 */
  detail: z.string(),
  /** 出错字段的 JSON Pointer */
  pointer: z.string().optional(),
  /** 严重程度位标志（0 表示无标志） */
  severity: z
    .number()
    .int()
    .refine((n) => n >= 0 && n <= VALIDATION_SEVERITY_MASK && (n & ~VALIDATION_SEVERITY_MASK) === 0, {
      message: 'unknown severity flag',
    })
    .optional(),
  code: z.string().optional(),
});

export const SuccessWire = z.object({
  ok: z.literal(true),
  kind: z.nativeEnum(Kind).refine(is_success_kind, { message: NON_SUCCESS_ON_SUCCESS }),
  value: z.unknown().optional(),
  message: z.string().optional(),
});

export const FailureWire = z.object({
  ok: z.literal(false),
  kind: z.nativeEnum(Kind).refine(is_failure_kind, { message: NON_ERROR_ON_FAILURE }),
  title: z.string(),
  detail: z.string().optional(),
  /** 展示用字符串错误；与 validationErrors 投影相同时视为未显式给出 */
  errors: z.array(z.string()).default([]),
  validationErrors: z.array(ValidationErrorWire).default([]),
  traceId: z.string().optional(),
});

export const ResultWire = z.discriminatedUnion('ok', [SuccessWire, FailureWire]);

export type ValidationErrorWireType = z.infer<typeof ValidationErrorWire>;
export type SuccessWireType = z.infer<typeof SuccessWire>;
export type FailureWireType = z.infer<typeof FailureWire>;
/** 输入侧形状：errors / validationErrors 可省略 */
export type ResultWireInput = z.input<typeof ResultWire>;
export type ResultWireType = z.infer<typeof ResultWire>;

/** 安全解析：成功返回 { success:true, data }；失败返回 { success:false, error } */
export function parse_result_wire(input: unknown) {
  return ResultWire.safeParse(input);
}
