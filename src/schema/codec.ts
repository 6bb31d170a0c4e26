import type { z } from 'zod';
import { Kind } from '../types';
import type { Failure, Result, ValidationError } from '../types';
import { create_failure, succeed } from '../result/result';
import { create_validation_error } from '../result/validation_error';
import { PointerRepresentation, render_pointer } from '../pointer/pointer';
import {
  parse_result_wire,
  type ResultWireType,
  type ValidationErrorWireType,
} from './result.schema';

export const SCHEMA_ERROR = 'SCHEMA_ERROR';

function validation_error_to_wire(ve: ValidationError): ValidationErrorWireType {
  return {
    detail: ve.detail,
    ...(ve.pointer !== undefined ? { pointer: ve.pointer } : {}),
    ...(ve.severity !== undefined ? { severity: ve.severity } : {}),
    ...(ve.code !== undefined ? { code: ve.code } : {}),
  };
}

/** Result → 线上形状；failure 的 errors 写出的是读取时的值（含投影） */
export function to_wire<T>(result: Result<T>): ResultWireType {
  if (result.ok) {
    return {
      ok: true,
      kind: result.kind,
      ...(result.value !== undefined ? { value: result.value } : {}),
      ...(result.message !== undefined ? { message: result.message } : {}),
    };
  }
  return {
    ok: false,
    kind: result.kind,
    title: result.title,
    ...(result.detail !== undefined ? { detail: result.detail } : {}),
    errors: [...result.errors],
    validationErrors: result.validation_errors.map(validation_error_to_wire),
    ...(result.trace_id !== undefined ? { traceId: result.trace_id } : {}),
  };
}

function same_strings(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((s, i) => s === b[i]);
}

/** 线上形状 → Result（已通过 schema 校验的数据） */
export function from_wire(wire: ResultWireType): Result<unknown> {
  if (wire.ok) return succeed(wire.value, wire.kind, wire.message);

  const validation_errors = wire.validationErrors.map((ve) =>
    create_validation_error({
      detail: ve.detail,
      pointer: ve.pointer,
      // 线上缺省即无严重程度
      severity: ve.severity ?? null,
      code: ve.code,
    }),
  );
  const projected = validation_errors.map((ve) => ve.detail);

  return create_failure({
    kind: wire.kind,
    title: wire.title,
    detail: wire.detail,
    errors: same_strings(wire.errors, projected) ? [] : wire.errors,
    validation_errors,
    trace_id: wire.traceId,
  });
}

export function serialize_result<T>(result: Result<T>, space?: number): string {
  return JSON.stringify(to_wire(result), null, space);
}

/** 把 zod 的 issues 转成 ValidationError[]，pointer 取 issue 的路径 */
export function issues_to_validation_errors(issues: readonly z.ZodIssue[]): ValidationError[] {
  return issues.map((issue) =>
    create_validation_error({
      detail: issue.message,
      pointer: render_pointer(issue.path.map(String), PointerRepresentation.JsonString),
      code: SCHEMA_ERROR,
    }),
  );
}

/**
 * 解析并还原一个 Result；输入不合法时返回 Invalid 失败，问题逐条落在 validation_errors 上。
 */
export function decode_result(input: unknown, title = 'Invalid result payload'): Result<Result<unknown>> {
  const parsed = parse_result_wire(input);
  if (!parsed.success) {
    const failure: Failure = create_failure({
      title,
      kind: Kind.Invalid,
      validation_errors: issues_to_validation_errors(parsed.error.issues),
    });
    return failure;
  }
  return succeed(from_wire(parsed.data));
}
