import type { DeclarationKind, Modifier } from '../../schema';
import type { Advisory, DeclarationNode } from '../../types';

/** 构造一个声明节点，便于在测试里拼树 */
export function decl(
  kind: DeclarationKind,
  simple_name: string,
  opts: {
    modifiers?: Modifier[];
    children?: DeclarationNode[];
    constant_value_known?: boolean;
    enclosing_kind?: DeclarationKind;
    enclosing_name?: string;
  } = {}
): DeclarationNode {
  return {
    kind,
    simple_name,
    modifiers: opts.modifiers ?? [],
    constant_value_known: opts.constant_value_known ?? false,
    children: opts.children ?? [],
    ...(opts.enclosing_kind ? { enclosing_kind: opts.enclosing_kind } : {}),
    ...(opts.enclosing_name !== undefined ? { enclosing_name: opts.enclosing_name } : {}),
  };
}

/** 只保留断言关心的字段 */
export function brief(a: Advisory) {
  return { path: a.path, name: a.node.simple_name, code: a.code };
}
