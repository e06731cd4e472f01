import type { DeclarationKind, Modifier } from '../schema';

/**
 * 一个程序声明（类型 / 方法 / 字段 / 常量 ...）。
 * 由外部前端构建，检查器只读，不修改也不持有。
 */
export interface DeclarationNode {
  readonly kind: DeclarationKind;
  /** 简单名（按 code point 计量，而不是 UTF-16 code unit）。 */
  readonly simple_name: string;
  /** 修饰符集合（不允许重复）。 */
  readonly modifiers: readonly Modifier[];
  /** 外层声明的种类；缺省时由扫描器取父节点的 kind。 */
  readonly enclosing_kind?: DeclarationKind;
  /** 外层声明的简单名；缺省时由扫描器取父节点的 simple_name。 */
  readonly enclosing_name?: string;
  /** 是否带有编译期常量初始值。 */
  readonly constant_value_known: boolean;
  /** 子声明（成员 / 参数），保持声明顺序。 */
  readonly children: readonly DeclarationNode[];
}

/** schema 的输入形状：缺省字段由 zod 补默认值 */
export interface DeclarationNodeInput {
  kind: DeclarationKind;
  simple_name: string;
  modifiers?: Modifier[];
  enclosing_kind?: DeclarationKind;
  enclosing_name?: string;
  constant_value_known?: boolean;
  children?: DeclarationNodeInput[];
}
