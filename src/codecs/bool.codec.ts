import type { ValueCodec } from '../types';
import { CodecError } from './errors';

export const bool_codec: ValueCodec<boolean> = {
  encode(value, sink) {
    if (typeof value !== 'boolean') {
      throw new CodecError('INVALID_VALUE', `bool expects a boolean, got ${typeof value}`, { type: 'bool' });
    }
    return sink.write(Uint8Array.of(value ? 1 : 0));
  },
  decode(source) {
    const [b] = source.read(1);
    if (b === 0) return false;
    if (b === 1) return true;
    throw new CodecError('INVALID_VALUE', `bool byte must be 0x00 or 0x01, got ${b}`, { type: 'bool', byte: b });
  },
  default: () => false,
};
