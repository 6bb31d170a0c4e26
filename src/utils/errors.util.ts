/**
 * 调用方违反契约（传入越界的 Kind、不支持的表达式等）时抛出。
 * 这类错误说明调用代码有缺陷，不应被当作业务失败处理。
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Kind 不在目标分支允许的区间内 */
export class KindRangeError extends ContractViolationError {
  constructor(
    readonly param: string,
    readonly reason: string,
  ) {
    super(`${reason} (Parameter '${param}')`);
  }
}

/** 路径表达式中出现了解析器不支持的节点 */
export class UnsupportedNodeError extends ContractViolationError {}

/** 有意未实现的功能 */
export class NotImplementedError extends ContractViolationError {}
