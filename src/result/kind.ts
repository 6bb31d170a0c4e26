import { Kind, KIND_FAILURE_BOUNDARY } from '../types';
import { KindRangeError } from '../utils/errors.util';

export const NON_SUCCESS_ON_SUCCESS = 'Cannot set non-success status to a success result.';
export const NON_ERROR_ON_FAILURE = 'Cannot set non-error status to a failure result.';

/** 全部成功类别，按序 */
export const SUCCESS_KINDS: readonly Kind[] = [Kind.Ok, Kind.Created, Kind.NoContent, Kind.Accepted];

/** 全部失败类别，按序 */
export const FAILURE_KINDS: readonly Kind[] = [
  Kind.Error,
  Kind.Critical,
  Kind.Unavailable,
  Kind.Invalid,
  Kind.Unprocessable,
  Kind.Forbidden,
  Kind.Unauthorized,
  Kind.Conflict,
  Kind.NotFound,
  Kind.FailedDependency,
];

export function is_success_kind(kind: Kind): boolean {
  return kind < KIND_FAILURE_BOUNDARY;
}

export function is_failure_kind(kind: Kind): boolean {
  return kind >= KIND_FAILURE_BOUNDARY;
}

/** 成功结果只能携带成功区间的 Kind，否则立即抛出 */
export function assert_success_kind(kind: Kind): Kind {
  if (!is_success_kind(kind)) throw new KindRangeError('kind', NON_SUCCESS_ON_SUCCESS);
  return kind;
}

/** 失败结果只能携带失败区间的 Kind，否则立即抛出 */
export function assert_failure_kind(kind: Kind): Kind {
  if (!is_failure_kind(kind)) throw new KindRangeError('kind', NON_ERROR_ON_FAILURE);
  return kind;
}

/** 枚举名（如 "NotFound"）→ Kind；未知名称返回 undefined */
export function parse_kind_name(name: string): Kind | undefined {
  return [...SUCCESS_KINDS, ...FAILURE_KINDS].find((k) => Kind[k] === name);
}
