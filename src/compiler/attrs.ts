import { issue } from '../schema';
import type {
  AttrRequirement,
  AttrSet,
  AttrValue,
  RequirementContext,
  RequirementTable,
  ValidationIssue,
  ValueClass,
} from '../types';

/** 只在类型级被消费一次的键：合并进更窄作用域前剥离 */
export const GLOBAL_ONLY_KEYS = ['crate', 'repr'] as const;

/** 同一作用域内互斥的判别值模式标记 */
export const EXCLUSIVE_KEYS = ['by_value', 'by_order'] as const;

export const DEFAULT_REPR = 'u8';

/** 单段或多段路径都算 path 类别 */
function accepts(cls: ValueClass, value: AttrValue): boolean {
  if (cls === 'path') return value.kind === 'path' || value.kind === 'ident';
  return value.kind === cls;
}

function class_of(req: AttrRequirement): ValueClass | null {
  switch (req.req) {
    case 'required_with_default':
    case 'optional':
      return req.class;
    case 'prohibited':
      return null;
  }
}

const flag: AttrRequirement = { req: 'optional', class: 'flag' };
const prohibited: AttrRequirement = { req: 'prohibited' };

/**
 * 每个上下文的要求表。
 * default_namespace 决定 crate 缺省时填入的路径。
 */
export function requirements_for(context: RequirementContext, default_namespace: string): RequirementTable {
  const crate: AttrRequirement = {
    req: 'required_with_default',
    class: 'path',
    default: default_namespace.includes('::')
      ? { kind: 'path', value: default_namespace }
      : { kind: 'ident', value: default_namespace },
  };
  const markers: Array<[string, AttrRequirement]> = [
    ['skip', flag],
    ['value', { req: 'optional', class: 'int' }],
    ['by_order', flag],
    ['by_value', flag],
  ];

  switch (context) {
    case 'struct_global':
      return new Map<string, AttrRequirement>([
        ['crate', crate],
        ['skip', prohibited],
        ['value', prohibited],
      ]);
    case 'enum_global':
      return new Map<string, AttrRequirement>([
        ['crate', crate],
        ['repr', { req: 'required_with_default', class: 'ident', default: { kind: 'ident', value: DEFAULT_REPR } }],
        ['by_order', flag],
        ['by_value', flag],
        ['skip', prohibited],
        ['value', prohibited],
      ]);
    case 'field_local':
      return new Map<string, AttrRequirement>([
        ['skip', flag],
        ['crate', prohibited],
        ['repr', prohibited],
      ]);
    case 'variant_local':
      return new Map<string, AttrRequirement>([...markers, ['crate', prohibited], ['repr', prohibited]]);
    case 'struct_field':
      return new Map<string, AttrRequirement>([['skip', flag]]);
    case 'enum_variant':
    case 'variant_field':
      return new Map(markers);
  }
}

export type CheckResult = { ok: true; attrs: AttrSet } | { ok: false; issue: ValidationIssue };

/**
 * 按要求表校验一个属性集合：
 * - 表中没有的键 → UNRECOGNIZED_KEY
 * - prohibited 的键出现 → PROHIBITED_KEY_PRESENT
 * - 值类别不符 → WRONG_VALUE_CLASS
 * 通过时返回补齐默认值后的新集合（原集合不变）。
 */
export function check_attrs(attrs: AttrSet, table: RequirementTable, path: string): CheckResult {
  for (const [key, value] of attrs) {
    const at = `${path}/attrs/${key}`;
    const req = table.get(key);
    if (!req) {
      const known = [...table].filter(([, r]) => r.req !== 'prohibited').map(([k]) => k);
      return {
        ok: false,
        issue: issue(
          'UNRECOGNIZED_KEY',
          at,
          `attribute '${key}' is not recognized here`,
          known.length ? `expected one of: ${known.join(', ')}` : 'no attributes are accepted here',
        ),
      };
    }
    const cls = class_of(req);
    if (cls === null) {
      return { ok: false, issue: issue('PROHIBITED_KEY_PRESENT', at, `attribute '${key}' is not allowed at this scope`) };
    }
    if (!accepts(cls, value)) {
      return {
        ok: false,
        issue: issue('WRONG_VALUE_CLASS', at, `attribute '${key}' requires ${describe_class(cls)}, got ${describe_value(value)}`),
      };
    }
  }

  const filled = new Map(attrs);
  for (const [key, req] of table) {
    if (req.req === 'required_with_default' && !filled.has(key)) filled.set(key, req.default);
  }
  return { ok: true, attrs: filled };
}

/** inner 的键遮蔽 outer 的同名键；两者都不被修改 */
export function merge_attrs(outer: AttrSet, inner: AttrSet): AttrSet {
  const merged = new Map(outer);
  for (const [key, value] of inner) merged.set(key, value);
  return merged;
}

export function strip_attrs(attrs: AttrSet, keys: ReadonlyArray<string>): AttrSet {
  const out = new Map(attrs);
  for (const key of keys) out.delete(key);
  return out;
}

/** 互斥检查必须在合并之后做：继承可能引入冲突 */
export function check_exclusive(attrs: AttrSet, path: string): ValidationIssue | null {
  const present = EXCLUSIVE_KEYS.filter((k) => attrs.has(k));
  if (present.length < 2) return null;
  return issue(
    'MUTUALLY_EXCLUSIVE_KEYS',
    `${path}/attrs`,
    '`by_value` and `by_order` attributes can not be present together',
    'an inherited type-level marker counts as present in every variant',
  );
}

function describe_class(cls: ValueClass): string {
  switch (cls) {
    case 'flag':
      return 'no value';
    case 'int':
      return 'an integer literal';
    case 'ident':
      return 'an identifier';
    case 'path':
      return 'a path';
  }
}

function describe_value(value: AttrValue): string {
  switch (value.kind) {
    case 'flag':
      return 'a bare marker';
    case 'int':
      return `integer ${value.value}`;
    case 'ident':
      return `identifier '${value.value}'`;
    case 'path':
      return `path '${value.value}'`;
  }
}
