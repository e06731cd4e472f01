/** 输入结构问题统一表示 */
export interface ValidationIssue {
  /** 机器可读错误码（如 SCHEMA_ERROR）。 */
  code: string;
  /** JSON Pointer 风格或近似路径（如 "/0/children/1/simple_name"）。 */
  path: string;
  /** 人类可读消息。 */
  message: string;
  /** 可选：修复建议。 */
  hint?: string;
}
