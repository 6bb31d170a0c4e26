import type { z } from 'zod';
import {
  create_call_node,
  create_convert_node,
  create_index_node,
  create_member_node,
  create_root_node,
  type PathNode,
} from './ast';
import { element_schema, field_schema, get_json_name } from './schema.util';

type Defined<T> = Exclude<T, null | undefined>;

/** T 上可访问的字段名（数组没有字段，只能取下标） */
export type FieldKey<T> = Defined<T> extends readonly unknown[] ? never : keyof Defined<T> & string;

export type FieldOf<T, K> = K extends keyof Defined<T> ? Defined<T>[K] : never;

export type ElementOf<T> = Defined<T> extends readonly (infer E)[] ? E : never;

/**
 * 类型化的路径构建器：每一步都受 T 的结构约束，拼错字段名在编译期就会报错。
 *
 *   path(ExampleSchema).field('Nested2').index(0).field('Value')
 */
export class PathBuilder<T> {
  private constructor(
    readonly node: PathNode,
    private readonly schema: z.ZodTypeAny | undefined,
  ) {}

  /** 从类型（可选附带 schema 以读取重命名标注）开始一条路径 */
  static root<T>(schema?: z.ZodTypeAny, name?: string): PathBuilder<T> {
    return new PathBuilder<T>(create_root_node(name), schema);
  }

  field<K extends FieldKey<T>>(name: K): PathBuilder<FieldOf<T, K>> {
    const child = field_schema(this.schema, name);
    const renamed = child ? get_json_name(child) : undefined;
    return new PathBuilder<FieldOf<T, K>>(create_member_node(this.node, name, renamed), child);
  }

  /** 数组下标：target[i] */
  index(i: number): PathBuilder<ElementOf<T>> {
    return new PathBuilder<ElementOf<T>>(create_index_node(this.node, i), element_schema(this.schema, i));
  }

  /** 按位置取元素：target.at(i) */
  at(i: number): PathBuilder<ElementOf<T>> {
    return new PathBuilder<ElementOf<T>>(create_call_node(this.node, 'at', [i]), element_schema(this.schema, i));
  }

  /** 标记一次隐式转换（不产生路径段） */
  widen(): PathBuilder<T> {
    return new PathBuilder<T>(create_convert_node(this.node), this.schema);
  }
}

/**
 * 开始一条路径。传入 zod schema 时，类型从 schema 推导，并读取字段上的 json_name 标注。
 */
export function path<S extends z.ZodTypeAny>(schema: S): PathBuilder<z.infer<S>>;
export function path<T>(): PathBuilder<T>;
export function path<T>(schema?: z.ZodTypeAny): PathBuilder<T> {
  return PathBuilder.root<T>(schema);
}
