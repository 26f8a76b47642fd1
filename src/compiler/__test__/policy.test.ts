import { describe, it, expect } from 'vitest';

import { builtin_registry } from '../../codecs/registry';
import type { EncodingPolicy } from '../../types';
import { resolve_global_policy, resolve_member_policy } from '../policy';
import { attrs, collector, flag, ident, int, path } from './helpers';

const catalog = builtin_registry();

function resolve_type(kind: 'struct' | 'enum', given = attrs()) {
  const { issues, add } = collector();
  const result = resolve_global_policy(
    { kind, attrs: given, path: '', default_namespace: 'strict_encoding', catalog },
    add,
  );
  return { result, issues };
}

const enum_parent: EncodingPolicy = {
  codec_namespace: 'strict_encoding',
  skip: false,
  discriminant_repr: 'u8',
  discriminant_mode: { kind: 'by_order' },
};

describe('resolve_global_policy', () => {
  it('applies defaults for an enum without attributes', () => {
    const { result, issues } = resolve_type('enum');
    expect(issues).toEqual([]);
    expect(result?.policy).toEqual({
      codec_namespace: 'strict_encoding',
      skip: false,
      discriminant_repr: 'u8',
      discriminant_mode: { kind: 'by_order' },
    });
    expect(result?.inherited.size).toBe(0);
  });

  it('strips crate and repr from the inherited set', () => {
    const { result } = resolve_type('enum', attrs({ by_value: flag, repr: ident('u16') }));
    expect(result?.policy.discriminant_repr).toBe('u16');
    expect(result?.policy.discriminant_mode).toEqual({ kind: 'by_native_ordinal' });
    expect([...(result?.inherited.keys() ?? [])]).toEqual(['by_value']);
  });

  it('rejects a repr that is not an unsigned integer type', () => {
    const { result, issues } = resolve_type('enum', attrs({ repr: ident('i32') }));
    expect(result).toBeNull();
    expect(issues).toEqual([
      {
        code: 'INVALID_REPR_KIND',
        path: '/attrs/repr',
        message: "`repr` requires an unsigned integer type identifier, got 'i32'",
        hint: 'use one of: u8, u16, u32, u64',
      },
    ]);
  });

  it('rejects both ordering markers at type scope', () => {
    const { result, issues } = resolve_type('enum', attrs({ by_value: flag, by_order: flag }));
    expect(result).toBeNull();
    expect(issues.map((i) => [i.code, i.path])).toEqual([['MUTUALLY_EXCLUSIVE_KEYS', '/attrs']]);
  });

  it('prohibits skip on a struct', () => {
    const { issues } = resolve_type('struct', attrs({ skip: flag }));
    expect(issues.map((i) => [i.code, i.path])).toEqual([['PROHIBITED_KEY_PRESENT', '/attrs/skip']]);
  });

  it('rejects a namespace the catalog does not know', () => {
    const { issues } = resolve_type('struct', attrs({ crate: path('other::wire') }));
    expect(issues).toEqual([
      {
        code: 'UNKNOWN_CODEC_NAMESPACE',
        path: '/attrs/crate',
        message: "codec namespace 'other::wire' is not registered",
      },
    ]);
  });
});

describe('resolve_member_policy', () => {
  it('takes an explicit value over an inherited by_value', () => {
    const { issues, add } = collector();
    const result = resolve_member_policy(
      {
        context: 'enum_variant',
        parent: enum_parent,
        inherited: attrs({ by_value: flag }),
        local: attrs({ value: int(200n) }),
        path: '/variants/0',
        default_namespace: 'strict_encoding',
      },
      add,
    );
    expect(issues).toEqual([]);
    expect(result?.policy.discriminant_mode).toEqual({ kind: 'explicit', value: 200n });
  });

  it('reports a conflict introduced by inheritance', () => {
    const { issues, add } = collector();
    const result = resolve_member_policy(
      {
        context: 'enum_variant',
        parent: enum_parent,
        inherited: attrs({ by_order: flag }),
        local: attrs({ by_value: flag }),
        path: '/variants/1',
        default_namespace: 'strict_encoding',
      },
      add,
    );
    expect(result).toBeNull();
    expect(issues.map((i) => [i.code, i.path])).toEqual([['MUTUALLY_EXCLUSIVE_KEYS', '/variants/1/attrs']]);
  });

  it('checks local attributes before merging', () => {
    const { issues, add } = collector();
    resolve_member_policy(
      {
        context: 'enum_variant',
        parent: enum_parent,
        inherited: attrs(),
        local: attrs({ crate: ident('x') }),
        path: '/variants/0',
        default_namespace: 'strict_encoding',
      },
      add,
    );
    expect(issues.map((i) => [i.code, i.path])).toEqual([['PROHIBITED_KEY_PRESENT', '/variants/0/attrs/crate']]);
  });

  it('keeps namespace and repr from the parent', () => {
    const { add } = collector();
    const parent: EncodingPolicy = { ...enum_parent, codec_namespace: 'my::wire', discriminant_repr: 'u32' };
    const result = resolve_member_policy(
      {
        context: 'struct_field',
        parent,
        inherited: attrs(),
        local: attrs({ skip: flag }),
        path: '/fields/0',
        default_namespace: 'strict_encoding',
      },
      add,
    );
    expect(result?.policy).toEqual({
      codec_namespace: 'my::wire',
      skip: true,
      discriminant_repr: 'u32',
      discriminant_mode: { kind: 'by_order' },
    });
  });

  it('does not accept discriminant attributes on a field', () => {
    const { issues, add } = collector();
    resolve_member_policy(
      {
        context: 'struct_field',
        parent: enum_parent,
        inherited: attrs(),
        local: attrs({ value: int(1n) }),
        path: '/fields/0',
        default_namespace: 'strict_encoding',
      },
      add,
    );
    expect(issues.map((i) => [i.code, i.path])).toEqual([['UNRECOGNIZED_KEY', '/fields/0/attrs/value']]);
  });

  it('lets variant fields inherit the markers of their variant', () => {
    const { issues, add } = collector();
    const result = resolve_member_policy(
      {
        context: 'variant_field',
        parent: enum_parent,
        inherited: attrs({ by_value: flag, value: int(5n) }),
        local: attrs(),
        path: '/variants/0/fields/0',
        default_namespace: 'strict_encoding',
      },
      add,
    );
    expect(issues).toEqual([]);
    expect(result?.policy.skip).toBe(false);
    expect([...(result?.attrs.keys() ?? [])]).toEqual(['by_value', 'value']);
  });
});
