/** 问题报告（RFC 9457 problem details 的形状） */
export interface ProblemReport {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  extensions: Record<string, unknown>;
}

/** as_problem_report 的覆盖项；未给出的字段从失败结果推导 */
export interface ProblemReportOverrides {
  detail?: string;
  instance?: string;
  status?: number;
  title?: string;
  type?: string;
  extensions?: Record<string, unknown>;
}

/** 附在 extensions.errors 下的单条校验问题 */
export interface ProblemErrorEntry {
  pointer?: string;
  detail: string;
}
