import type { DeclarationKind } from '../schema';
import type { RuleFinding } from '../types';
import { check_all_caps } from './rules/all_caps';
import { check_camel_case } from './rules/camel_case';
import { is_heuristically_constant, type ConstantFacts } from './rules/constant';

/**
 * 命名约定种类（按节点推导，不存储）
 */
export enum ConventionKind {
  UpperCamelCase = 'upper_camel_case',
  LowerCamelCase = 'lower_camel_case',
  AllCapsUnderscore = 'all_caps_underscore',
}

export type DeclarationCategory = 'type' | 'executable' | 'variable' | 'other';

export function category_of(kind: DeclarationKind): DeclarationCategory {
  switch (kind) {
    case 'class':
    case 'interface':
    case 'enum':
    case 'annotation_type':
    case 'record':
      return 'type';
    case 'method':
    case 'constructor':
    case 'static_init':
    case 'instance_init':
      return 'executable';
    case 'field':
    case 'enum_constant':
    case 'parameter':
    case 'local_variable':
    case 'exception_parameter':
    case 'resource_variable':
      return 'variable';
    case 'type_parameter':
      return 'other';
  }
}

/**
 * 推导节点适用的命名约定；null 表示不检查。
 * 构造器、初始化块只遍历不检查；枚举常量总是按常量处理。
 */
export function convention_of(facts: ConstantFacts): ConventionKind | null {
  switch (category_of(facts.kind)) {
    case 'type':
      return ConventionKind.UpperCamelCase;
    case 'executable':
      return facts.kind === 'method' ? ConventionKind.LowerCamelCase : null;
    case 'variable':
      return facts.kind === 'enum_constant' || is_heuristically_constant(facts)
        ? ConventionKind.AllCapsUnderscore
        : ConventionKind.LowerCamelCase;
    case 'other':
      return null;
  }
}

export function check_convention(name: string, convention: ConventionKind): RuleFinding | null {
  switch (convention) {
    case ConventionKind.UpperCamelCase:
      return check_camel_case(name, true);
    case ConventionKind.LowerCamelCase:
      return check_camel_case(name, false);
    case ConventionKind.AllCapsUnderscore:
      return check_all_caps(name);
  }
}
