import { z } from 'zod';

/**
 * 字段重命名标注：以 schema 实例为键。
 * 相当于给字段挂上 "序列化时叫这个名字" 的属性。
 */
const json_names = new WeakMap<z.ZodTypeAny, string>();

/**
 * 给字段 schema 标注序列化名，返回同一个 schema 便于链式书写：
 *
 *   z.object({ Nested2: json_name(z.array(Example3), 'Barrs') })
 */
export function json_name<S extends z.ZodTypeAny>(schema: S, name: string): S {
  json_names.set(schema, name);
  return schema;
}

/** 剥掉一层不影响结构的包装（optional / nullable / default 等） */
function unwrap_once(schema: z.ZodTypeAny): z.ZodTypeAny | undefined {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) return schema.unwrap();
  if (schema instanceof z.ZodDefault) return schema.removeDefault();
  if (schema instanceof z.ZodEffects) return schema.innerType();
  if (schema instanceof z.ZodLazy) return schema.schema;
  if (schema instanceof z.ZodBranded || schema instanceof z.ZodReadonly) return schema.unwrap();
  if (schema instanceof z.ZodCatch) return schema.removeCatch();
  return undefined;
}

/** 找字段上的重命名标注；会穿过包装层，外层标注优先 */
export function get_json_name(schema: z.ZodTypeAny): string | undefined {
  let current: z.ZodTypeAny | undefined = schema;
  while (current) {
    const name = json_names.get(current);
    if (name !== undefined) return name;
    current = unwrap_once(current);
  }
  return undefined;
}

export function unwrap_schema(schema: z.ZodTypeAny): z.ZodTypeAny {
  let current = schema;
  for (let next = unwrap_once(current); next; next = unwrap_once(current)) current = next;
  return current;
}

/** 对象字段的 schema；父级不是对象或字段不存在时返回 undefined */
export function field_schema(schema: z.ZodTypeAny | undefined, key: string): z.ZodTypeAny | undefined {
  if (!schema) return undefined;
  const inner = unwrap_schema(schema);
  if (!(inner instanceof z.ZodObject)) return undefined;
  const shape: z.ZodRawShape = inner.shape;
  return Object.prototype.hasOwnProperty.call(shape, key) ? shape[key] : undefined;
}

/** 序列元素的 schema；元组按位置取 */
export function element_schema(schema: z.ZodTypeAny | undefined, index: number): z.ZodTypeAny | undefined {
  if (!schema) return undefined;
  const inner = unwrap_schema(schema);
  if (inner instanceof z.ZodArray) return inner.element;
  if (inner instanceof z.ZodTuple) {
    const items: z.ZodTypeAny[] = inner.items;
    return items[index] ?? inner._def.rest ?? undefined;
  }
  return undefined;
}

export function is_object_schema(schema: z.ZodTypeAny | undefined): boolean {
  return schema !== undefined && unwrap_schema(schema) instanceof z.ZodObject;
}
