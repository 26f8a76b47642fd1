import type { CodecCatalog, ValueCodec } from '../types';
import { bool_codec } from './bool.codec';
import { float_codec } from './float.codec';
import { big_int_codec, small_int_codec } from './int.codec';
import { bytes_codec, string_codec } from './text.codec';

/** 内置命名空间，也是 crate 属性的默认值 */
export const STRICT_ENCODING = 'strict_encoding';

/**
 * 命名空间 → 值类型名 → 编解码实现。
 * 推导期作为 CodecCatalog 使用；绑定计划时按 (namespace, type) 取出实现。
 */
export class CodecRegistry implements CodecCatalog {
  private readonly namespaces = new Map<string, Map<string, ValueCodec>>();

  define(namespace: string, type_name: string, codec: ValueCodec): this {
    let table = this.namespaces.get(namespace);
    if (!table) {
      table = new Map();
      this.namespaces.set(namespace, table);
    }
    table.set(type_name, codec);
    return this;
  }

  lookup(namespace: string, type_name: string): ValueCodec | undefined {
    return this.namespaces.get(namespace)?.get(type_name);
  }

  has_namespace(namespace: string): boolean {
    return this.namespaces.has(namespace);
  }

  has_type(namespace: string, type_name: string): boolean {
    return this.lookup(namespace, type_name) !== undefined;
  }

  has_default(namespace: string, type_name: string): boolean {
    return typeof this.lookup(namespace, type_name)?.default === 'function';
  }
}

/** 新建一个只含 strict_encoding 基础类型的注册表 */
export function builtin_registry(): CodecRegistry {
  return new CodecRegistry()
    .define(STRICT_ENCODING, 'u8', small_int_codec(1, false))
    .define(STRICT_ENCODING, 'u16', small_int_codec(2, false))
    .define(STRICT_ENCODING, 'u32', small_int_codec(4, false))
    .define(STRICT_ENCODING, 'u64', big_int_codec(false))
    .define(STRICT_ENCODING, 'i8', small_int_codec(1, true))
    .define(STRICT_ENCODING, 'i16', small_int_codec(2, true))
    .define(STRICT_ENCODING, 'i32', small_int_codec(4, true))
    .define(STRICT_ENCODING, 'i64', big_int_codec(true))
    .define(STRICT_ENCODING, 'f32', float_codec(4))
    .define(STRICT_ENCODING, 'f64', float_codec(8))
    .define(STRICT_ENCODING, 'bool', bool_codec)
    .define(STRICT_ENCODING, 'string', string_codec)
    .define(STRICT_ENCODING, 'bytes', bytes_codec);
}
