import { CodecError } from '../codecs/errors';
import type { CodecRegistry } from '../codecs/registry';
import type { CodecPlanType, EnumCodecPlanType, StructCodecPlanType } from '../schema';
import type { EngineError, EnumValue, StructValue } from '../types';
import { bind_enum, bind_struct, type BoundCodec } from './bind';

export type { BoundCodec } from './bind';

/**
 * bind_plan()
 * -----------
 * 把计划中的每个值类型在 (codec_namespace, value_type) 下解析为具体实现。
 * 命名空间只在这里被使用一次，运行期不再出现。
 */
export function bind_plan(plan: StructCodecPlanType, registry: CodecRegistry): BoundCodec<StructValue>;
export function bind_plan(plan: EnumCodecPlanType, registry: CodecRegistry): BoundCodec<EnumValue>;
export function bind_plan(plan: CodecPlanType, registry: CodecRegistry): BoundCodec<StructValue> | BoundCodec<EnumValue>;
export function bind_plan(plan: CodecPlanType, registry: CodecRegistry): BoundCodec<StructValue> | BoundCodec<EnumValue> {
  return plan.kind === 'struct' ? bind_struct(plan, registry) : bind_enum(plan, registry);
}

/** 绑定并注册为 (codec_namespace, type_name)，供后续计划嵌套使用 */
export function register_plan(registry: CodecRegistry, plan: CodecPlanType): void {
  const bound = bind_plan(plan, registry);
  registry.define(plan.codec_namespace, plan.type_name, bound.as_value_codec());
}

export type SafeDecodeResult<T> = { ok: true; value: T } | { ok: false; error: EngineError };

/** 不抛编解码错误的 decode：失败时返回结构化 EngineError */
export function safe_decode<T>(codec: BoundCodec<T>, bytes: Uint8Array): SafeDecodeResult<T> {
  try {
    return { ok: true, value: codec.decode(bytes) };
  } catch (e) {
    if (e instanceof CodecError) return { ok: false, error: e.to_engine_error() };
    throw e;
  }
}
