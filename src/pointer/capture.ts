import type { z } from 'zod';
import {
  create_call_node,
  create_constant_node,
  create_index_node,
  create_member_node,
  create_root_node,
  NodeKind,
  type PathNode,
  unsupported_node,
} from './ast';
import { element_schema, field_schema, get_json_name, is_object_schema } from './schema.util';

type Defined<T> = Exclude<T, null | undefined>;

/**
 * 选择器入参的类型：结构与 T 一致，但每一层读到的都是记录访问路径的代理。
 */
export type PathProxy<T> =
  Defined<T> extends readonly (infer E)[]
    ? { readonly [index: number]: PathProxy<E>; at(index: number): PathProxy<E> }
    : Defined<T> extends object
      ? { readonly [K in keyof Defined<T>]-?: PathProxy<Defined<T>[K]> }
      : Defined<T>;

export type PathSelector<T> = (root: PathProxy<T>) => unknown;

const INDEX_KEY = /^(0|[1-9]\d*)$/;

// 代理 → 它所代表的节点
const proxy_nodes = new WeakMap<object, PathNode>();

/**
 * @param node 代理所代表的表达式
 * @param schema 该表达式的值的 schema（未知为 undefined）
 * @param receiver 该表达式所属对象的 schema，用于解析方法调用
 */
function make_proxy(
  node: PathNode,
  schema: z.ZodTypeAny | undefined,
  receiver: z.ZodTypeAny | undefined,
): object {
  // apply 陷阱要求目标可调用；箭头函数没有 prototype，不会触发代理不变量
  const target = (): void => undefined;
  const proxy = new Proxy(target, {
    get(_target, key) {
      // 参与运算或拼接（t.Items + 1、`${t.Items}`）不是字段访问
      if (key === Symbol.toPrimitive) throw unsupported_node(node);
      if (typeof key === 'symbol') return undefined;
      return step(node, schema, key);
    },
    apply(_target, _this, args: unknown[]) {
      return invoke(node, receiver, args);
    },
  });
  proxy_nodes.set(proxy, node);
  return proxy;
}

function step(node: PathNode, schema: z.ZodTypeAny | undefined, key: string): object {
  // 对象上的数字键仍是字段；其余情况（序列或未知结构）按下标处理
  if (INDEX_KEY.test(key) && !is_object_schema(schema)) {
    const index = Number(key);
    return make_proxy(create_index_node(node, index), element_schema(schema, index), schema);
  }
  const child = field_schema(schema, key);
  const renamed = child ? get_json_name(child) : undefined;
  return make_proxy(create_member_node(node, key, renamed), child, schema);
}

function invoke(node: PathNode, receiver: z.ZodTypeAny | undefined, args: unknown[]): object {
  if (node.kind !== NodeKind.Member) {
    return make_proxy(create_call_node(node, '', args), undefined, undefined);
  }
  const first = args[0];
  const schema = node.name === 'at' && typeof first === 'number' ? element_schema(receiver, first) : undefined;
  return make_proxy(create_call_node(node.target, node.name, args), schema, undefined);
}

/**
 * 根代理对任意字段读取都返回下一层代理，结构上满足 PathProxy<T>。
 */
function root_proxy<T>(schema: z.ZodTypeAny | undefined, name: string): PathProxy<T>;
function root_proxy(schema: z.ZodTypeAny | undefined, name: string): unknown {
  return make_proxy(create_root_node(name), schema, undefined);
}

function node_of(value: unknown): PathNode | undefined {
  if ((typeof value === 'object' && value !== null) || typeof value === 'function') {
    return proxy_nodes.get(value);
  }
  return undefined;
}

/**
 * 运行一次选择器，把其中的字段访问、下标与调用记录成表达式树。
 * 选择器返回与入参无关的值时得到 Constant 节点（解析时会被拒绝）。
 *
 *   capture_path<Example>((t) => t.Nested2[0].Value, ExampleSchema)
 */
export function capture_path<T>(selector: PathSelector<T>, schema?: z.ZodTypeAny, name = 't'): PathNode {
  const result = selector(root_proxy<T>(schema, name));
  return node_of(result) ?? create_constant_node(result);
}
