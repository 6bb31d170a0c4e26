import { NodeKind, unsupported_node, type PathNode } from './ast';
import { capture_path, type PathSelector } from './capture';
import type { NamingPolicy } from './naming.util';
import { NotImplementedError } from '../utils/errors.util';
import type { z } from 'zod';

/**
 * JSON Pointer 的表示形式（RFC 6901）
 */
export enum PointerRepresentation {
  /** §3 的规范形式（~0 / ~1 转义）；未实现 */
  Normal = 'normal',
  /** §5 JSON 字符串形式，如 "/nested/value" */
  JsonString = 'json_string',
  /** §6 URI 片段形式，如 "#/nested/value" */
  UriFragment = 'uri_fragment',
}

export interface PointerOptions {
  /** 无重命名标注的字段按此策略转换；不设则用声明名 */
  naming?: NamingPolicy;
  representation?: PointerRepresentation;
}

export interface SelectorPointerOptions extends PointerOptions {
  /** 提供后读取字段上的 json_name 标注，并用于区分字段与下标 */
  schema?: z.ZodTypeAny;
}

/** 下标字面量无法转成文本时，整条路径退化为这一段 */
export const INVALID_EXPRESSION = 'INVALID_EXPRESSION';

/** 表达式树，或持有表达式树的构建器（PathBuilder） */
export type PathSource = PathNode | { readonly node: PathNode };

function to_node(source: PathSource): PathNode {
  return 'node' in source ? source.node : source;
}

// 下标只能是非负安全整数；负数在 at() 里表示从末尾数起，不对应任何段
function is_position(value: number | bigint): boolean {
  return typeof value === 'bigint' ? value >= 0n : Number.isSafeInteger(value) && value >= 0;
}

function literal_text(value: unknown): string | undefined {
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'string') return String(value);
  return undefined;
}

/**
 * 从叶子往根走，把路径段压栈，最后得到根 → 叶子顺序的段列表。
 */
export function resolve_segments(source: PathSource, naming?: NamingPolicy): string[] {
  const stack: string[] = [];
  let current = to_node(source);

  while (current.kind !== NodeKind.Root) {
    switch (current.kind) {
      case NodeKind.Convert:
        current = current.operand;
        continue;

      case NodeKind.Member:
        stack.push(current.json_name ?? (naming ? naming(current.name) : current.name));
        current = current.target;
        break;

      case NodeKind.Index: {
        const { index } = current;
        if ((typeof index === 'number' || typeof index === 'bigint') && !is_position(index)) {
          throw unsupported_node(current);
        }
        const text = literal_text(index);
        if (text === undefined) return [INVALID_EXPRESSION];
        stack.push(text);
        current = current.target;
        break;
      }

      case NodeKind.Call:
        // 只认 at(非负整数字面量)
        if (current.method === 'at' && current.args.length === 1) {
          const [arg] = current.args;
          if (arg === null || arg === undefined) return [INVALID_EXPRESSION];
          if (typeof arg === 'number' && is_position(arg)) {
            stack.push(String(arg));
            current = current.target;
            break;
          }
        }
        throw unsupported_node(current);

      case NodeKind.Constant:
        throw unsupported_node(current);
    }
  }

  return stack.reverse();
}

/**
 * 按 RFC 3986 对片段中的段做百分号编码，只保留 unreserved 字符。
 */
export function escape_data_string(segment: string): string {
  return encodeURIComponent(segment).replace(
    /[!'()*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/** 把段列表渲染成指定表示形式 */
export function render_pointer(segments: readonly string[], representation: PointerRepresentation): string {
  switch (representation) {
    case PointerRepresentation.Normal:
      throw new NotImplementedError(`JSON pointer representation '${representation}' is not implemented`);
    case PointerRepresentation.JsonString:
      return segments.length === 0 ? '' : '/' + segments.join('/');
    case PointerRepresentation.UriFragment:
      return segments.length === 0 ? '#' : '#/' + segments.map(escape_data_string).join('/');
  }
}

/**
 * 路径 → JSON Pointer。默认 JsonString 形式。
 *
 *   get_json_pointer(path(ExampleSchema).field('Nested').field('Value'), { naming: camel_case })
 *   // => "/nested/value"
 */
export function get_json_pointer(source: PathSource, options: PointerOptions = {}): string {
  const representation = options.representation ?? PointerRepresentation.JsonString;
  // Normal 无论输入如何都直接失败，不先解析路径
  if (representation === PointerRepresentation.Normal) return render_pointer([], representation);
  return render_pointer(resolve_segments(source, options.naming), representation);
}

/** URI 片段形式，如 "#/Example3Array/0/Nested/1" */
export function get_json_uri_pointer(source: PathSource, options: Omit<PointerOptions, 'representation'> = {}): string {
  return get_json_pointer(source, { ...options, representation: PointerRepresentation.UriFragment });
}

/**
 * 选择器 → JSON Pointer：
 *
 *   pointer_of<Example>((t) => t.Nested2[0].Value, { schema: ExampleSchema, naming: camel_case })
 *   // => "/Barrs/0/value"
 */
export function pointer_of<T>(selector: PathSelector<T>, options: SelectorPointerOptions = {}): string {
  return get_json_pointer(capture_path(selector, options.schema), options);
}

export function uri_pointer_of<T>(
  selector: PathSelector<T>,
  options: Omit<SelectorPointerOptions, 'representation'> = {},
): string {
  return get_json_uri_pointer(capture_path(selector, options.schema), options);
}
