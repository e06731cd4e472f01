import type { Advisory, AdvisorySink } from './advisory.type';
import type { ValidationIssue } from './issue.type';

/** ---------------------------
 *  检查阶段（输入 / 诊断 / 输出）
 * ---------------------------*/

/** 检查入口参数 */
export interface CheckInput {
  /** 声明森林（已解析为 JS 对象；通常来自前端导出的 JSON）。 */
  declarations: unknown;
  /** 可选：每条建议产生时立即转发到这里。 */
  sink?: AdvisorySink;
}

/** 检查输出 */
export interface CheckOutput {
  /** 输入结构是否合法（命名建议不会让它变成 false）。 */
  ok: boolean;
  /** 按发出顺序收集的全部建议。 */
  advisories: Advisory[];
  /** 输入结构错误（SCHEMA_ERROR）；非空时不做扫描。 */
  errors: ValidationIssue[];
  /** 检查耗时（毫秒）。 */
  time_ms: number;
}
