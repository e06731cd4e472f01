import type { DeclarationNode } from './declaration.type';

export type AdvisorySeverity = 'info' | 'warning';

export type AdvisoryCode =
  | 'CAMEL_CASE_INITIAL_LOWER'
  | 'CAMEL_CASE_INITIAL_UPPER'
  | 'CAMEL_CASE'
  | 'ALL_CAPS'
  | 'METHOD_NAMED_LIKE_TYPE';

/** 规则引擎的纯结果：只有码和消息，不关心节点与位置 */
export interface RuleFinding {
  code: AdvisoryCode;
  message: string;
}

/** 命名建议（非致命），总是归属到具体的声明节点 */
export interface Advisory extends RuleFinding {
  /** 出问题的节点（引用，供宿主映射回源码位置）。 */
  readonly node: DeclarationNode;
  readonly severity: AdvisorySeverity;
  /** JSON Pointer 风格路径（如 "/0/children/2"）。 */
  readonly path: string;
}

/** 只追加的消息出口，由调用方注入 */
export type AdvisorySink = (advisory: Advisory) => void;
