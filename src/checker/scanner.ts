import type { Advisory, AdvisorySink, DeclarationNode, RuleFinding } from '../types';
import { category_of, check_convention, convention_of } from './convention';

/**
 * 对声明森林做一次深度优先遍历：父节点先于子节点，兄弟节点保持给定顺序。
 * 每条建议产生后立即交给 sink，不缓冲；遇到违规也不会中断遍历。
 *
 * @param base_path 根节点路径前缀（根节点路径为 `${base_path}/${i}`）
 */
export function check_all(roots: readonly DeclarationNode[], sink: AdvisorySink, base_path = ''): void {
  roots.forEach((root, i) => visit(root, null, `${base_path}/${i}`, sink));
}

function visit(node: DeclarationNode, parent: DeclarationNode | null, path: string, sink: AdvisorySink): void {
  // 节点自带的外层信息优先，其次取父节点；外层名称只认类型
  const enclosing_kind = node.enclosing_kind ?? parent?.kind ?? null;
  const parent_type_name = parent && category_of(parent.kind) === 'type' ? parent.simple_name : null;
  const enclosing_name = node.enclosing_name ?? parent_type_name;

  const emit = (finding: RuleFinding) => {
    const advisory: Advisory = { node, path, severity: 'warning', ...finding };
    sink(advisory);
  };

  // 普通方法与所在类型同名：容易和构造器混淆（与命名检查相互独立）
  if (node.kind === 'method' && node.simple_name === enclosing_name) {
    emit({
      code: 'METHOD_NAMED_LIKE_TYPE',
      message: `Ordinary method '${node.simple_name}' should not share its type's name, to avoid confusion with a constructor`,
    });
  }

  const convention = convention_of({
    kind: node.kind,
    modifiers: node.modifiers,
    enclosing_kind,
    constant_value_known: node.constant_value_known,
  });
  if (convention) {
    const finding = check_convention(node.simple_name, convention);
    if (finding) emit(finding);
  }

  node.children.forEach((child, i) => visit(child, node, `${path}/children/${i}`, sink));
}
