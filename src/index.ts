export { derive, derive_all } from './compiler';
export { bind_plan, register_plan, safe_decode } from './engine';
export type { BoundCodec, SafeDecodeResult } from './engine';
export {
  CodecRegistry,
  builtin_registry,
  STRICT_ENCODING,
  CodecError,
  UnknownVariantError,
  ByteReader,
  ByteWriter,
} from './codecs';
export type { CodecErrorCode } from './codecs';
export { parse_type_spec, parse_plan } from './schema';
export type {
  TypeSpecType,
  FieldSpec,
  VariantSpec,
  CodecPlanType,
  StructCodecPlanType,
  EnumCodecPlanType,
  EncodeOpType,
  DecodeOpType,
} from './schema';
export { DISCRIMINANT_REPRS } from './types';
export type * from './types';
