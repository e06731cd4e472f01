import type { RuleFinding } from '../../types';
import { code_points, is_lower, is_upper } from '../../utils/codepoint.util';

/**
 * 驼峰命名检查。
 * - 首个 code point 的大小写必须与 require_initial_upper 一致，否则直接报错，不再扫描
 * - 首个 code point 无大小写（数字、下划线、汉字等）或名称为空：记为不规范
 * - 其余部分不允许出现两个连续的大写（parseURL / HTTPServer 都会被拒绝）
 */
export function check_camel_case(name: string, require_initial_upper: boolean): RuleFinding | null {
  const cps = code_points(name);
  if (cps.length === 0) return not_camel_case(name);

  const [first, ...rest] = cps;
  if (is_upper(first)) {
    if (!require_initial_upper) {
      return { code: 'CAMEL_CASE_INITIAL_LOWER', message: `Name '${name}' should start lowercase` };
    }
  } else if (is_lower(first)) {
    if (require_initial_upper) {
      return { code: 'CAMEL_CASE_INITIAL_UPPER', message: `Name '${name}' should start uppercase` };
    }
  } else {
    return not_camel_case(name);
  }

  let previous_upper = is_upper(first);
  for (const cp of rest) {
    if (is_upper(cp)) {
      if (previous_upper) return not_camel_case(name);
      previous_upper = true;
    } else {
      previous_upper = false;
    }
  }
  return null;
}

function not_camel_case(name: string): RuleFinding {
  return { code: 'CAMEL_CASE', message: `Name '${name}' should follow camelCase` };
}
