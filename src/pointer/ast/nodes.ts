import { UnsupportedNodeError } from "../../utils/errors.util";

/**
 * 路径表达式节点类型枚举
 */
export enum NodeKind {
  Root = "root",
  Member = "member",
  Index = "index",
  Call = "call",
  Convert = "convert",
  Constant = "constant"
}

/**
 * 所有节点的基础结构
 */
export interface BaseNode { kind: NodeKind }

/**
 * 根节点：表达式的入参本身，不产生路径段
 */
export interface RootNode extends BaseNode {
  kind: NodeKind.Root;
  /** 渲染表达式时使用的参数名 */
  name: string;
}

/**
 * 成员访问节点：读取 target 上名为 name 的字段
 */
export interface MemberNode extends BaseNode {
  kind: NodeKind.Member;
  target: PathNode;
  /** 字段的声明名 */
  name: string;
  /** 字段上的重命名标注（优先于命名策略） */
  json_name?: string;
}

/**
 * 数组下标节点：target[index]，index 为字面量
 */
export interface IndexNode extends BaseNode {
  kind: NodeKind.Index;
  target: PathNode;
  index: unknown;
}

/**
 * 方法调用节点：target.method(...args)；method 为空串表示直接调用 target
 */
export interface CallNode extends BaseNode {
  kind: NodeKind.Call;
  target: PathNode;
  method: string;
  args: readonly unknown[];
}

/**
 * 隐式转换节点（如数值拓宽）：不产生路径段
 */
export interface ConvertNode extends BaseNode {
  kind: NodeKind.Convert;
  operand: PathNode;
}

/**
 * 常量节点：表达式直接返回了一个与入参无关的值
 */
export interface ConstantNode extends BaseNode {
  kind: NodeKind.Constant;
  value: unknown;
}

export type PathNode =
  | RootNode
  | MemberNode
  | IndexNode
  | CallNode
  | ConvertNode
  | ConstantNode;

/**
 * 创建根节点
 * @param name 参数名，仅用于渲染
 */
export function create_root_node(name = "t"): RootNode {
  return { kind: NodeKind.Root, name };
}

/**
 * 创建成员访问节点
 * @param target 被访问的对象表达式
 * @param name 字段声明名
 * @param json_name 重命名标注（可选）
 */
export function create_member_node(
  target: PathNode,
  name: string,
  json_name?: string,
): MemberNode {
  return json_name === undefined
    ? { kind: NodeKind.Member, target, name }
    : { kind: NodeKind.Member, target, name, json_name };
}

/**
 * 创建数组下标节点
 */
export function create_index_node(target: PathNode, index: unknown): IndexNode {
  return { kind: NodeKind.Index, target, index };
}

/**
 * 创建方法调用节点
 */
export function create_call_node(
  target: PathNode,
  method: string,
  args: readonly unknown[],
): CallNode {
  return { kind: NodeKind.Call, target, method, args };
}

export function create_convert_node(operand: PathNode): ConvertNode {
  return { kind: NodeKind.Convert, operand };
}

export function create_constant_node(value: unknown): ConstantNode {
  return { kind: NodeKind.Constant, value };
}

/**
 * 把节点渲染回表达式文本（用于报错信息），如 `t.Nested2[0].Value`
 */
export function render_node(node: PathNode): string {
  switch (node.kind) {
    case NodeKind.Root:
      return node.name;
    case NodeKind.Member:
      return `${render_node(node.target)}.${node.name}`;
    case NodeKind.Index:
      return `${render_node(node.target)}[${render_literal(node.index)}]`;
    case NodeKind.Call: {
      const args = node.args.map(render_literal).join(", ");
      return node.method
        ? `${render_node(node.target)}.${node.method}(${args})`
        : `${render_node(node.target)}(${args})`;
    }
    case NodeKind.Convert:
      return `Convert(${render_node(node.operand)})`;
    case NodeKind.Constant:
      return render_literal(node.value);
  }
}

function render_literal(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  if (typeof value === "object" && value !== null) return Array.isArray(value) ? "[...]" : "{...}";
  return String(value);
}

/** 表达式中出现解析器不支持的节点时抛出的错误，如 `Call (at t.Items.filter()) not supported` */
export function unsupported_node(node: PathNode): UnsupportedNodeError {
  const kind = node.kind.charAt(0).toUpperCase() + node.kind.slice(1);
  return new UnsupportedNodeError(`${kind} (at ${render_node(node)}) not supported`);
}
