import { createHash } from "crypto";

/**
 * 将输入对象转化为"规范化"的字符串：
 * - 删除所有 null / undefined 值
 * - 深度排序对象的 key（数组保持原顺序：字段/变体顺序有语义）
 * - 使用 JSON.stringify 序列化
 *
 * 相同语义的计划会得到完全一致的字符串，用于生成 plan_id。
 */
export function canonical_stringify(input: unknown): string {
  return JSON.stringify(sort_deep(strip_nulls(input)));
}

/**
 * 计算输入字符串的 SHA-256 哈希值，并返回带前缀的十六进制表示。
 *
 * 示例：
 *   hash_sha256("hello")
 *   => "sha256:2cf24dba5...9824"
 */
export function hash_sha256(text: string): string {
  const h = createHash("sha256").update(text, "utf8").digest("hex");
  return `sha256:${h}`;
}

function is_plain_object(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** 递归删除对象中值为 null / undefined 的字段 */
function strip_nulls(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(strip_nulls);

  if (is_plain_object(v)) {
    const out: Record<string, unknown> = {};
    for (const k of Object.keys(v)) {
      const val = v[k];
      if (val === null || typeof val === "undefined") continue;
      out[k] = strip_nulls(val);
    }
    return out;
  }

  return v;
}

/** 深度排序对象的 key */
function sort_deep(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(sort_deep);

  if (is_plain_object(v)) {
    const out: Record<string, unknown> = {};
    for (const k of Object.keys(v).sort()) {
      out[k] = sort_deep(v[k]);
    }
    return out;
  }

  return v;
}
