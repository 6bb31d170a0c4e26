import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { Kind } from '../types';
import type { Failure, Result } from '../types';
import { create_failure, succeed } from '../result/result';
import { as_problem_report, problem_to_json } from '../problem/problem_report';
import { decode_result, issues_to_validation_errors } from '../schema/codec';
import { ProblemOverridesInput } from '../schema/problem.schema';

export type CliOptions = {
  pretty?: string | boolean;
  minify?: boolean;
  out?: string; // 可选：写到文件，默认打印到 stdout
  detail?: string;
  instance?: string;
  status?: string;
  title?: string;
  type?: string;
};

export function to_pretty_spaces(opt: CliOptions): number {
  if (opt.minify) return 0;
  if (opt.pretty === false) return 0;
  if (opt.pretty === true || opt.pretty === undefined) return 2;
  const n = Number(opt.pretty);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : 2;
}

/**
 * 读入的 JSON → 问题报告（RFC 9457 JSON 形状）。
 * 输入不合法、输入是成功结果、覆盖项不合法时都返回失败，由调用方打印。
 */
export function build_problem(input: unknown, opts: CliOptions): Result<Record<string, unknown>> {
  const decoded = decode_result(input);
  if (!decoded.ok) return decoded;

  const result = decoded.value;
  if (result.ok) {
    return create_failure({
      title: 'Nothing to report',
      errors: ['input is a success result; only failures become problem reports'],
      kind: Kind.Unprocessable,
    });
  }

  const overrides = ProblemOverridesInput.safeParse({
    detail: opts.detail,
    instance: opts.instance,
    status: opts.status,
    title: opts.title,
    type: opts.type,
  });
  if (!overrides.success) {
    return create_failure({
      title: 'Invalid options',
      validation_errors: issues_to_validation_errors(overrides.error.issues),
    });
  }

  return succeed(problem_to_json(as_problem_report(result, overrides.data)));
}

/** 失败 → 逐行的可读文本 */
export function format_failure(failure: Failure): string[] {
  const lines = [`❌ ${failure.title || Kind[failure.kind]} (${failure.errors.length} error(s)):`];
  if (failure.validation_errors.length > 0) {
    for (const ve of failure.validation_errors) {
      lines.push(`  - [${ve.code ?? Kind[failure.kind]}] ${ve.pointer ?? ''} : ${ve.detail}`);
    }
  } else {
    for (const e of failure.errors) lines.push(`  - ${e}`);
  }
  return lines;
}

/** 写文件，自动建目录并保证末尾换行 */
export async function write_output(target: string, text: string): Promise<string> {
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, text.endsWith('\n') ? text : text + '\n', 'utf8');
  return target;
}
