import type { ValueCodec } from '../types';
import { view_of } from './bytes.util';
import { CodecError } from './errors';

/** IEEE-754 小端浮点 */
export function float_codec(width: 4 | 8): ValueCodec<number> {
  const name = `f${width * 8}`;
  return {
    encode(value, sink) {
      if (typeof value !== 'number') {
        throw new CodecError('INVALID_VALUE', `${name} expects a number, got ${typeof value}`, { type: name });
      }
      const bytes = new Uint8Array(width);
      if (width === 4) view_of(bytes).setFloat32(0, value, true);
      else view_of(bytes).setFloat64(0, value, true);
      return sink.write(bytes);
    },
    decode(source) {
      const view = view_of(source.read(width));
      return width === 4 ? view.getFloat32(0, true) : view.getFloat64(0, true);
    },
    default: () => 0,
  };
}
