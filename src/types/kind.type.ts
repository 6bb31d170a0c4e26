/**
 * 结果类别（有序）。
 *
 * 以 `Kind.Error` 为分界：之前是成功区间，之后（含）是失败区间。
 * 只允许在末尾追加新成员，不要在中间插入，否则分界会漂移。
 */
export enum Kind {
  Ok,
  Created,
  NoContent,
  Accepted,

  Error,
  Critical,
  Unavailable,
  Invalid,
  Unprocessable,
  Forbidden,
  Unauthorized,
  Conflict,
  NotFound,
  FailedDependency,
}

/** 成功区间与失败区间的分界值 */
export const KIND_FAILURE_BOUNDARY = Kind.Error;

/** 校验问题严重程度（位标志，可组合，如 `Error | Critical`） */
export enum ValidationSeverity {
  None = 0,
  Error = 1 << 0,
  Critical = 1 << 1,
  Warning = 1 << 2,
  Info = 1 << 3,
}

/** 所有标志位的并集 */
export const VALIDATION_SEVERITY_MASK =
  ValidationSeverity.Error |
  ValidationSeverity.Critical |
  ValidationSeverity.Warning |
  ValidationSeverity.Info;
