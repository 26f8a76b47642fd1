import { ByteReader, ByteWriter } from '../codecs/bytes.util';
import { CodecError, UnknownVariantError } from '../codecs/errors';
import { read_uint } from '../codecs/int.codec';
import type { CodecRegistry } from '../codecs/registry';
import type { CodecPlanType, EnumCodecPlanType, StructCodecPlanType } from '../schema';
import type { ByteSink, ByteSource, EnumValue, StructValue, ValueCodec } from '../types';
import { at_key, bind_decode_op, bind_encode_op, type CodecLookup, type DecodeStep, type EncodeStep } from './ops';

/**
 * 绑定到具体注册表的计划。
 * encode 按声明顺序每个字段只写一次；decode 严格顺序读取，首个错误即失败。
 */
export interface BoundCodec<T> {
  readonly plan: CodecPlanType;
  encode(value: T): Uint8Array;
  /** 返回写入的字节数 */
  encode_into(value: T, sink: ByteSink): number;
  /** 整段输入必须恰好被消耗完 */
  decode(bytes: Uint8Array): T;
  /** 流式读取，不检查尾部剩余 */
  decode_from(source: ByteSource): T;
  /** 作为值编解码器嵌入其他计划 */
  as_value_codec(): ValueCodec<T>;
}

function is_record(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

function is_enum_value(value: unknown): value is { variant: string; fields?: unknown } {
  return is_record(value) && typeof value.variant === 'string';
}

function run_encode(steps: ReadonlyArray<EncodeStep>, record: Record<string, unknown>, sink: ByteSink): number {
  let len = 0;
  for (const step of steps) len += step({ record, sink });
  return len;
}

function run_decode(steps: ReadonlyArray<DecodeStep>, source: ByteSource): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const step of steps) step({ out, source });
  return out;
}

function make_bound<T>(
  plan: CodecPlanType,
  encode_unknown: (value: unknown, sink: ByteSink) => number,
  decode_from: (source: ByteSource) => T,
  make_default?: () => T,
): BoundCodec<T> {
  return {
    plan,
    encode(value) {
      const w = new ByteWriter();
      encode_unknown(value, w);
      return w.finish();
    },
    encode_into: (value, sink) => encode_unknown(value, sink),
    decode(bytes) {
      const reader = new ByteReader(bytes);
      const value = decode_from(reader);
      if (reader.remaining > 0) {
        throw new CodecError(
          'DATA_NOT_ENTIRELY_CONSUMED',
          `${reader.remaining} trailing byte(s) after '${plan.type_name}'`,
          { type_name: plan.type_name, consumed: reader.offset, remaining: reader.remaining },
        );
      }
      return value;
    },
    decode_from,
    as_value_codec: () =>
      make_default
        ? { encode: encode_unknown, decode: decode_from, default: make_default }
        : { encode: encode_unknown, decode: decode_from },
  };
}

function lookup_in(registry: CodecRegistry, namespace: string, type_name: string): CodecLookup {
  return (value_type) => {
    const codec = registry.lookup(namespace, value_type);
    if (!codec) {
      throw new Error(`'${type_name}': no codec for '${value_type}' in namespace '${namespace}'`);
    }
    return codec;
  };
}

export function bind_struct(plan: StructCodecPlanType, registry: CodecRegistry): BoundCodec<StructValue> {
  const lookup = lookup_in(registry, plan.codec_namespace, plan.type_name);
  const encode_steps = plan.encode.map((op) => bind_encode_op(op, lookup));
  const decode_steps = plan.decode.map((op) => bind_decode_op(op, lookup));

  // 所有字段类型都有默认值时，结构体自身也有默认值
  const defaults: Array<[string, () => unknown]> = [];
  for (const f of plan.fields) {
    const d = lookup(f.value_type).default;
    if (d) defaults.push([f.key, d]);
  }
  const make_default =
    defaults.length === plan.fields.length
      ? (): StructValue => Object.fromEntries(defaults.map(([key, d]) => [key, d()]))
      : undefined;

  return make_bound<StructValue>(
    plan,
    (value, sink) => {
      if (!is_record(value)) {
        throw new CodecError('INVALID_VALUE', `struct '${plan.type_name}' expects an object`, { type_name: plan.type_name });
      }
      return run_encode(encode_steps, value, sink);
    },
    (source) => run_decode(decode_steps, source),
    make_default,
  );
}

export function bind_enum(plan: EnumCodecPlanType, registry: CodecRegistry): BoundCodec<EnumValue> {
  const lookup = lookup_in(registry, plan.codec_namespace, plan.type_name);
  const repr = plan.discriminant_repr;

  type Arm = { name: string; encode: EncodeStep[]; decode: DecodeStep[] };
  const by_name = new Map<string, Arm>();
  const by_discriminant = new Map<string, Arm>();
  for (const v of plan.variants) {
    const arm: Arm = {
      name: v.name,
      encode: v.encode.map((op) => bind_encode_op(op, lookup)),
      decode: v.decode.map((op) => bind_decode_op(op, lookup)),
    };
    // 从文件读回的计划未经推导期唯一性检查
    const holder = by_discriminant.get(v.discriminant);
    if (holder) {
      throw new Error(`'${plan.type_name}': variants '${holder.name}' and '${v.name}' share discriminant ${v.discriminant}`);
    }
    by_name.set(v.name, arm);
    by_discriminant.set(v.discriminant, arm);
  }
  const skipped = new Set(plan.skipped_variants.map((v) => v.name));

  return make_bound<EnumValue>(
    plan,
    (value, sink) => {
      if (!is_enum_value(value)) {
        throw new CodecError('INVALID_VALUE', `enum '${plan.type_name}' expects { variant, fields }`, {
          type_name: plan.type_name,
        });
      }
      const arm = by_name.get(value.variant);
      if (!arm) {
        throw new CodecError(
          'UNENCODABLE_VARIANT',
          skipped.has(value.variant)
            ? `variant '${value.variant}' of '${plan.type_name}' is skipped and can not be encoded`
            : `enum '${plan.type_name}' has no variant '${value.variant}'`,
          { type_name: plan.type_name, variant: value.variant },
        );
      }
      const fields = value.fields === undefined ? {} : value.fields;
      if (!is_record(fields)) {
        throw new CodecError('INVALID_VALUE', `fields of '${plan.type_name}::${arm.name}' must be an object`, {
          type_name: plan.type_name,
          variant: arm.name,
        });
      }
      return at_key(arm.name, () => run_encode(arm.encode, fields, sink));
    },
    (source) => {
      const raw = read_uint(repr, source);
      const arm = by_discriminant.get(raw.toString());
      if (!arm) throw new UnknownVariantError(plan.type_name, raw);
      const fields = at_key(arm.name, () => run_decode(arm.decode, source));
      return { variant: arm.name, fields };
    },
  );
}
