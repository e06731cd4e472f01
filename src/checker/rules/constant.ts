import type { DeclarationKind, Modifier } from '../../schema';

/** 判断常量所需的节点快照 */
export interface ConstantFacts {
  kind: DeclarationKind;
  modifiers: readonly Modifier[];
  enclosing_kind: DeclarationKind | null;
  constant_value_known: boolean;
}

const PUBLIC_STATIC_FINAL: readonly Modifier[] = ['public', 'static', 'final'];

/**
 * 启发式判断变量是否为常量，按顺序命中即返回：
 * 1. 接口里的成员
 * 2. public static final 字段
 * 3. 带编译期常量初始值
 */
export function is_heuristically_constant(facts: ConstantFacts): boolean {
  if (facts.enclosing_kind === 'interface') return true;
  if (facts.kind === 'field' && PUBLIC_STATIC_FINAL.every(m => facts.modifiers.includes(m))) return true;
  return facts.constant_value_known;
}
