import { describe, it, expect } from 'vitest';
import { z } from 'zod';

import {
  camel_case,
  create_call_node,
  create_convert_node,
  create_index_node,
  create_member_node,
  create_root_node,
  get_json_pointer,
  get_json_uri_pointer,
  INVALID_EXPRESSION,
  json_name,
  path,
  pointer_of,
  PointerRepresentation,
  snake_case_lower,
  uri_pointer_of,
} from '../index';
import { NotImplementedError, UnsupportedNodeError } from '../../utils/errors.util';

const Example2 = z.object({ Value: z.string() });
const Example3 = z.object({ Value: z.string() });
const ExampleSchema = z.object({
  Value: z.string(),
  Nested: Example2,
  Nested2: json_name(z.array(Example3), 'Barrs'),
});
type Example = z.infer<typeof ExampleSchema>;

const camel = { schema: ExampleSchema, naming: camel_case };

describe('pointer_of', () => {
  it('applies the naming policy to a top-level field', () => {
    expect(pointer_of<Example>((t) => t.Value, camel)).toBe('/value');
  });

  it('walks nested fields', () => {
    expect(pointer_of<Example>((t) => t.Nested.Value, camel)).toBe('/nested/value');
  });

  it('prefers the rename annotation and encodes the index', () => {
    expect(pointer_of<Example>((t) => t.Nested2[0].Value, camel)).toBe('/Barrs/0/value');
  });

  it('keeps a rename that matches the declared name', () => {
    const Renamed = z.object({ Value: json_name(z.string(), 'Value') });
    expect(pointer_of<z.infer<typeof Renamed>>((t) => t.Value, { schema: Renamed, naming: camel_case })).toBe('/Value');
  });

  it('treats at(i) on a sequence as an index', () => {
    expect(pointer_of<Example>((t) => t.Nested2.at(1).Value, camel)).toBe('/Barrs/1/value');
  });

  it('uses declared names when no policy is set', () => {
    expect(pointer_of<Example>((t) => t.Nested.Value, { schema: ExampleSchema })).toBe('/Nested/Value');
  });

  it('reads numeric keys as indexes without a schema', () => {
    type Order = { Items: { UnitPrice: number }[] };
    expect(pointer_of<Order>((t) => t.Items[2].UnitPrice, { naming: snake_case_lower })).toBe('/items/2/unit_price');
  });

  it('looks through optional wrappers for annotations', () => {
    const Tagged = z.object({ Tags: json_name(z.array(z.string()), 'labels').optional() });
    expect(pointer_of<z.infer<typeof Tagged>>((t) => t.Tags[1], { schema: Tagged })).toBe('/labels/1');
  });

  it('renders the whole document as an empty pointer', () => {
    expect(pointer_of<Example>((t) => t)).toBe('');
    expect(uri_pointer_of<Example>((t) => t)).toBe('#');
  });

  it('rejects a selector that returns a constant', () => {
    expect(() => pointer_of<Example>(() => 5)).toThrow(UnsupportedNodeError);
    expect(() => pointer_of<Example>(() => 5)).toThrow('Constant (at 5) not supported');
  });

  it('rejects method calls other than at', () => {
    expect(() => pointer_of<Example>((t) => t.Value.toUpperCase())).toThrow(
      'Call (at t.Value.toUpperCase()) not supported',
    );
  });

  it('rejects at with a non-integer argument', () => {
    expect(() => pointer_of<Example>((t) => t.Nested2.at(1.5))).toThrow('Call (at t.Nested2.at(1.5)) not supported');
  });

  it('rejects at with a negative argument', () => {
    expect(() => pointer_of<Example>((t) => t.Nested2.at(-1).Value, camel)).toThrow(
      'Call (at t.Nested2.at(-1)) not supported',
    );
  });
});

describe('uri fragment representation', () => {
  it('prefixes with #', () => {
    expect(uri_pointer_of<Example>((t) => t.Nested2[0].Value, camel)).toBe('#/Barrs/0/value');
  });

  it('percent-encodes each segment', () => {
    const Odd = z.object({ Field: json_name(z.string(), "a b/c'd") });
    const source = path(Odd).field('Field');
    expect(get_json_uri_pointer(source)).toBe('#/a%20b%2Fc%27d');
    expect(get_json_pointer(source)).toBe("/a b/c'd");
  });
});

describe('normal representation', () => {
  it('always fails', () => {
    expect(() => get_json_pointer(path<Example>(), { representation: PointerRepresentation.Normal })).toThrow(
      NotImplementedError,
    );
    expect(() =>
      get_json_pointer(path(ExampleSchema).field('Value'), { representation: PointerRepresentation.Normal }),
    ).toThrow(NotImplementedError);
  });
});

describe('path builder', () => {
  it('builds the same pointers as the selector form', () => {
    const source = path(ExampleSchema).field('Nested2').index(0).field('Value');
    expect(get_json_pointer(source, { naming: camel_case })).toBe('/Barrs/0/value');
    expect(get_json_pointer(path(ExampleSchema).field('Nested2').at(3), { naming: camel_case })).toBe('/Barrs/3');
  });

  it('rejects indexes that are not non-negative integers', () => {
    const items = path(ExampleSchema).field('Nested2');
    expect(() => get_json_pointer(items.index(1.5))).toThrow('Index (at t.Nested2[1.5]) not supported');
    expect(() => get_json_pointer(items.index(Number.NaN))).toThrow('Index (at t.Nested2[NaN]) not supported');
    expect(() => get_json_pointer(items.index(-1))).toThrow(UnsupportedNodeError);
    expect(() => get_json_pointer(items.at(-1))).toThrow('Call (at t.Nested2.at(-1)) not supported');
  });

  it('skips widening adapters', () => {
    const source = path(ExampleSchema).field('Nested').widen().field('Value').widen();
    expect(get_json_pointer(source, { naming: camel_case })).toBe('/nested/value');
  });
});

describe('hand-built expressions', () => {
  const root = create_root_node();

  it('unwraps a convert node', () => {
    expect(get_json_pointer(create_convert_node(create_member_node(root, 'Count')))).toBe('/Count');
  });

  it('degrades to the sentinel when an index literal has no text', () => {
    const items = create_member_node(root, 'Items');
    const node = create_member_node(create_index_node(items, null), 'Name');
    expect(get_json_pointer(node)).toBe(`/${INVALID_EXPRESSION}`);
    expect(get_json_pointer(create_call_node(items, 'at', [undefined]))).toBe('/INVALID_EXPRESSION');
  });

  it('accepts bigint and string index literals', () => {
    const items = create_member_node(root, 'Items');
    expect(get_json_pointer(create_index_node(items, 4n))).toBe('/Items/4');
    expect(get_json_pointer(create_index_node(items, '7'))).toBe('/Items/7');
  });

  it('rejects a negative bigint index', () => {
    const items = create_member_node(root, 'Items');
    expect(() => get_json_pointer(create_index_node(items, -1n))).toThrow('Index (at t.Items[-1n]) not supported');
  });

  it('names the unsupported node kind', () => {
    const call = create_call_node(create_member_node(root, 'Items'), 'filter', [1, 'x']);
    expect(() => get_json_pointer(call)).toThrow('Call (at t.Items.filter(1, "x")) not supported');
  });
});
