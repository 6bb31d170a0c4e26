import type {
  ProblemErrorEntry,
  ProblemReport,
  ProblemReportOverrides,
  Result,
} from '../types';
import { ContractViolationError } from '../utils/errors.util';
import { kind_to_status } from './status';

export const STATUS_DOCUMENTATION_BASE = 'https://developer.mozilla.org/en-US/docs/Web/HTTP/Reference/Status';

/**
 * 把失败结果转成问题报告。
 *
 * - 传入成功结果属于调用方缺陷，直接抛出
 * - detail 依次取：覆盖项 → 失败的 detail → 第一条字符串错误
 * - 有校验问题时，在 extensions.errors 下附上 { pointer, detail } 列表
 */
export function as_problem_report<T>(result: Result<T>, overrides: ProblemReportOverrides = {}): ProblemReport {
  if (result.ok) {
    throw new ContractViolationError('result must be a failure to be reported as a problem.');
  }

  const extensions: Record<string, unknown> = { ...(overrides.extensions ?? {}) };
  if (result.validation_errors.length > 0) {
    if ('errors' in extensions) {
      throw new ContractViolationError(`extension key 'errors' is reserved for validation errors.`);
    }
    extensions.errors = result.validation_errors.map(
      (ve): ProblemErrorEntry => (ve.pointer !== undefined ? { pointer: ve.pointer, detail: ve.detail } : { detail: ve.detail }),
    );
  }

  const kind_status = kind_to_status(result.kind);
  const detail = overrides.detail ?? result.detail ?? result.errors[0];

  return {
    type: overrides.type ?? `${STATUS_DOCUMENTATION_BASE}/${kind_status}`,
    title: overrides.title ?? result.title,
    status: overrides.status ?? kind_status,
    ...(detail !== undefined ? { detail } : {}),
    ...(overrides.instance !== undefined ? { instance: overrides.instance } : {}),
    extensions,
  };
}

/**
 * 按 RFC 9457 的 JSON 形状展开：extensions 的成员提升到顶层。
 * 与标准成员同名的扩展不会覆盖标准成员。
 */
export function problem_to_json(report: ProblemReport): Record<string, unknown> {
  const { extensions, ...members } = report;
  return { ...extensions, ...members };
}
