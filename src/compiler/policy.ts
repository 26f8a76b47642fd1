import {
  DISCRIMINANT_REPRS,
  type AddIssue,
  type AttrSet,
  type CodecCatalog,
  type DiscriminantMode,
  type DiscriminantRepr,
  type EncodingPolicy,
  type ValidationIssue,
} from '../types';
import {
  check_attrs,
  check_exclusive,
  GLOBAL_ONLY_KEYS,
  merge_attrs,
  requirements_for,
  strip_attrs,
} from './attrs';

/** 类型级解析结果：policy 自身 + 剥离 crate/repr 后供子作用域继承的属性 */
export interface GlobalResolution {
  policy: EncodingPolicy;
  inherited: AttrSet;
}

/** 成员级解析结果：attrs 为合并并校验后的集合（变体字段从这里继承） */
export interface MemberResolution {
  policy: EncodingPolicy;
  attrs: AttrSet;
}

export type MemberContext = 'struct_field' | 'enum_variant' | 'variant_field';

function is_repr(name: string): name is DiscriminantRepr {
  const reprs: ReadonlyArray<string> = DISCRIMINANT_REPRS;
  return reprs.includes(name);
}

function mode_of(attrs: AttrSet): DiscriminantMode {
  const value = attrs.get('value');
  if (value?.kind === 'int') return { kind: 'explicit', value: value.value };
  return attrs.has('by_value') ? { kind: 'by_native_ordinal' } : { kind: 'by_order' };
}

/**
 * 解析类型级（global）作用域。
 * crate / repr 只在这里被消费；repr 必须是四种定宽无符号整数之一。
 */
export function resolve_global_policy(
  args: {
    kind: 'struct' | 'enum';
    attrs: AttrSet;
    path: string;
    default_namespace: string;
    catalog: CodecCatalog;
  },
  add_issue: AddIssue,
): GlobalResolution | null {
  const { kind, path } = args;
  const fail = (found: ValidationIssue) => {
    add_issue(found.code, found.path, found.message, found.hint);
    return null;
  };

  const checked = check_attrs(
    args.attrs,
    requirements_for(kind === 'struct' ? 'struct_global' : 'enum_global', args.default_namespace),
    path,
  );
  if (!checked.ok) return fail(checked.issue);
  const attrs = checked.attrs;

  const conflict = check_exclusive(attrs, path);
  if (conflict) return fail(conflict);

  let discriminant_repr: DiscriminantRepr = 'u8';
  const repr = attrs.get('repr');
  if (repr?.kind === 'ident') {
    if (!is_repr(repr.value)) {
      add_issue(
        'INVALID_REPR_KIND',
        `${path}/attrs/repr`,
        `\`repr\` requires an unsigned integer type identifier, got '${repr.value}'`,
        `use one of: ${DISCRIMINANT_REPRS.join(', ')}`,
      );
      return null;
    }
    discriminant_repr = repr.value;
  }

  const crate = attrs.get('crate');
  const codec_namespace =
    crate && (crate.kind === 'ident' || crate.kind === 'path') ? crate.value : args.default_namespace;
  if (!args.catalog.has_namespace(codec_namespace)) {
    add_issue('UNKNOWN_CODEC_NAMESPACE', `${path}/attrs/crate`, `codec namespace '${codec_namespace}' is not registered`);
    return null;
  }

  return {
    policy: {
      codec_namespace,
      skip: false,
      discriminant_repr,
      discriminant_mode: mode_of(attrs),
    },
    inherited: strip_attrs(attrs, GLOBAL_ONLY_KEYS),
  };
}

/**
 * 解析成员（字段 / 变体 / 变体字段）作用域：
 *  1. 仅校验本地属性（本地要求表）
 *  2. 把外层属性合并进来（本地优先）
 *  3. 剥离类型级专属键
 *  4. 按上下文要求表校验合并结果，并做互斥检查
 *  5. 提取 policy；命名空间与 repr 沿用类型级已消费的值
 * 任一步失败即中止，不返回部分 policy。
 */
export function resolve_member_policy(
  args: {
    context: MemberContext;
    parent: EncodingPolicy;
    inherited: AttrSet;
    local: AttrSet;
    path: string;
    default_namespace: string;
  },
  add_issue: AddIssue,
): MemberResolution | null {
  const { context, path, default_namespace } = args;
  const fail = (found: ValidationIssue) => {
    add_issue(found.code, found.path, found.message, found.hint);
    return null;
  };

  const local_only = check_attrs(
    args.local,
    requirements_for(context === 'enum_variant' ? 'variant_local' : 'field_local', default_namespace),
    path,
  );
  if (!local_only.ok) return fail(local_only.issue);

  const merged = strip_attrs(merge_attrs(args.inherited, args.local), GLOBAL_ONLY_KEYS);

  const checked = check_attrs(merged, requirements_for(context, default_namespace), path);
  if (!checked.ok) return fail(checked.issue);

  const conflict = check_exclusive(checked.attrs, path);
  if (conflict) return fail(conflict);

  return {
    policy: {
      codec_namespace: args.parent.codec_namespace,
      skip: checked.attrs.has('skip'),
      discriminant_repr: args.parent.discriminant_repr,
      discriminant_mode: mode_of(checked.attrs),
    },
    attrs: checked.attrs,
  };
}
