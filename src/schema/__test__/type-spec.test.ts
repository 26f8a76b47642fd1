import { describe, it, expect } from 'vitest';

import { parse_type_spec, type TypeSpecType } from '../type-spec.schema';

function parsed(input: unknown): TypeSpecType {
  const result = parse_type_spec(input);
  if (!result.success) throw new Error(result.error.message);
  return result.data;
}

describe('parse_type_spec', () => {
  it('classifies attribute shorthands', () => {
    const spec = parsed({
      name: 'E',
      kind: 'enum',
      attrs: { repr: 'u16', crate: 'my::wire', by_value: true },
      variants: [{ name: 'A', attrs: { value: 5, skip: null } }],
    });
    expect([...spec.attrs]).toEqual([
      ['repr', { kind: 'ident', value: 'u16' }],
      ['crate', { kind: 'path', value: 'my::wire' }],
      ['by_value', { kind: 'flag' }],
    ]);
    if (spec.kind !== 'enum') throw new Error('expected enum');
    expect([...(spec.variants[0]?.attrs ?? [])]).toEqual([
      ['value', { kind: 'int', value: 5n }],
      ['skip', { kind: 'flag' }],
    ]);
  });

  it('continues ordinals from the previous variant', () => {
    const spec = parsed({
      name: 'E',
      kind: 'enum',
      variants: [{ name: 'A', ordinal: 5 }, { name: 'B' }, { name: 'C', ordinal: -1 }, { name: 'D' }],
    });
    if (spec.kind !== 'enum') throw new Error('expected enum');
    expect(spec.variants.map((v) => v.ordinal)).toEqual([5n, 6n, -1n, 0n]);
  });

  it('reads exact integers from decimal strings', () => {
    const spec = parsed({
      name: 'E',
      kind: 'enum',
      variants: [{ name: 'A', ordinal: { int: '-1' } }, { name: 'B', attrs: { value: { int: '18446744073709551615' } } }],
    });
    if (spec.kind !== 'enum') throw new Error('expected enum');
    expect(spec.variants.map((v) => v.ordinal)).toEqual([-1n, 0n]);
    expect(spec.variants[1]?.attrs.get('value')).toEqual({ kind: 'int', value: 18446744073709551615n });
  });

  it('rejects a decimal string that is not an integer', () => {
    const result = parse_type_spec({ name: 'E', kind: 'enum', variants: [{ name: 'A', ordinal: { int: '1.5' } }] });
    expect(result.success).toBe(false);
  });

  it('rejects an empty field type', () => {
    const result = parse_type_spec({ name: 'S', kind: 'struct', fields: [{ name: 'a', type: '' }] });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues.map((i) => [i.path, i.message])).toEqual([[['fields', 0, 'type'], 'field type must not be empty']]);
  });

  it('normalizes declaration order from index', () => {
    const spec = parsed({
      name: 'S',
      kind: 'struct',
      fields: [
        { name: 'b', index: 1, type: 'u8' },
        { name: 'a', index: 0, type: 'u8' },
      ],
    });
    if (spec.kind !== 'struct') throw new Error('expected struct');
    expect(spec.fields.map((f) => [f.key, f.index])).toEqual([
      ['a', 0],
      ['b', 1],
    ]);
  });

  it('requires index on every member or none', () => {
    const result = parse_type_spec({
      name: 'S',
      kind: 'struct',
      fields: [{ name: 'a', index: 0, type: 'u8' }, { name: 'b', type: 'u8' }],
    });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues.map((i) => [i.path, i.message])).toEqual([
      [['fields'], 'index must be given on every member or on none'],
    ]);
  });

  it('requires indices to form a permutation', () => {
    const result = parse_type_spec({
      name: 'E',
      kind: 'enum',
      variants: [{ name: 'A', index: 0 }, { name: 'B', index: 2 }],
    });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]?.message).toBe('indices must form a permutation of 0..1; missing 1');
  });

  it('rejects duplicate field names', () => {
    const result = parse_type_spec({
      name: 'S',
      kind: 'struct',
      fields: [{ name: 'a', type: 'u8' }, { name: 'a', type: 'u16' }],
    });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]?.path).toEqual(['fields', 1, 'name']);
  });

  it('rejects unknown properties', () => {
    const result = parse_type_spec({ name: 'S', kind: 'struct', fields: [], extra: 1 });
    expect(result.success).toBe(false);
  });
});
