export { CodecRegistry, builtin_registry, STRICT_ENCODING } from './registry';
export { CodecError, UnknownVariantError, type CodecErrorCode } from './errors';
export { ByteReader, ByteWriter } from './bytes.util';
export { read_uint, write_uint, uint_max, REPR_WIDTH } from './int.codec';
