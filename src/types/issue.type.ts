/** 配置/结构问题统一表示（解析、策略解析与计划推导阶段使用） */
export interface ValidationIssue {
  /** 机器可读错误码（如 SCHEMA_ERROR / UNRECOGNIZED_KEY / MUTUALLY_EXCLUSIVE_KEYS）。 */
  code: string;
  /** JSON Pointer 风格路径，定位到作用域与属性键（如 "/variants/1/attrs/value"）。 */
  path: string;
  /** 人类可读消息（面向类型作者/日志）。 */
  message: string;
  /** 可选：修复建议。 */
  hint?: string;
}

/** 收集问题的回调：推导函数遇错时调用它并返回 null */
export type AddIssue = (code: string, path: string, message: string, hint?: string) => void;
