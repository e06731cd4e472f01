import { issue, parse_declarations } from '../schema';
import type { Advisory, CheckInput, CheckOutput, ValidationIssue } from '../types';
import { check_all } from './scanner';

export function check(input: CheckInput): CheckOutput {
  // 记时
  const t0 = Date.now();
  // zod safe parse 获取声明树校验结果
  const result = parse_declarations(input.declarations);
  const errors: ValidationIssue[] = [];
  const advisories: Advisory[] = [];

  // 结构不合法：不扫描，只返回错误
  if (!result.success) {
    for (const e of result.error.issues) {
      errors.push(issue('SCHEMA_ERROR', '/' + e.path.join('/'), e.message));
    }
    return { ok: false, advisories, errors, time_ms: Date.now() - t0 };
  }

  check_all(result.data, advisory => {
    advisories.push(advisory);
    input.sink?.(advisory);
  });

  return { ok: true, advisories, errors, time_ms: Date.now() - t0 };
}

export { check_all } from './scanner';
export { ConventionKind, category_of, check_convention, convention_of } from './convention';
export type { DeclarationCategory } from './convention';
export { check_camel_case } from './rules/camel_case';
export { check_all_caps } from './rules/all_caps';
export { is_heuristically_constant } from './rules/constant';
export type { ConstantFacts } from './rules/constant';
