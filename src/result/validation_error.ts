import { ValidationSeverity } from '../types';
import type { ValidationError, ValidationErrorInit } from '../types';

/**
 * 构造一条校验问题。
 * severity 省略时为 Error；显式传 null 则不带严重程度。
 *
 * 例：validation_error('balance must not be negative', '/balance')
 */
export function validation_error(
  detail: string,
  pointer?: string,
  severity: ValidationSeverity | null = ValidationSeverity.Error,
  code?: string,
): ValidationError {
  return create_validation_error({ detail, pointer, severity, code });
}

export function create_validation_error(init: ValidationErrorInit): ValidationError {
  const severity = init.severity === undefined ? ValidationSeverity.Error : init.severity;
  // 缺省字段不落成 undefined 键，序列化时直接省略
  return Object.freeze({
    detail: init.detail,
    ...(init.pointer !== undefined ? { pointer: init.pointer } : {}),
    ...(severity !== null ? { severity } : {}),
    ...(init.code !== undefined ? { code: init.code } : {}),
  });
}

/** 是否包含某个严重程度标志（None 只与无标志的问题匹配） */
export function has_severity(error: ValidationError, flag: ValidationSeverity): boolean {
  const severity = error.severity ?? ValidationSeverity.None;
  if (flag === ValidationSeverity.None) return severity === ValidationSeverity.None;
  return (severity & flag) === flag;
}

export function with_pointer(error: ValidationError, pointer: string): ValidationError {
  return create_validation_error({ ...error, pointer, severity: error.severity ?? null });
}
