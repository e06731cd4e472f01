import type { RuleFinding } from '../../types';
import { code_points, is_digit, is_upper } from '../../utils/codepoint.util';

/**
 * 常量命名检查：以大写字母开头，其余只能是大写字母、数字或单个下划线。
 */
export function check_all_caps(name: string): RuleFinding | null {
  const cps = code_points(name);
  if (cps.length === 0 || !is_upper(cps[0])) return not_all_caps(name);

  let previous_underscore = false;
  for (const cp of cps.slice(1)) {
    if (cp === '_') {
      // 不允许连续两个下划线
      if (previous_underscore) return not_all_caps(name);
      previous_underscore = true;
    } else {
      previous_underscore = false;
      if (!is_upper(cp) && !is_digit(cp)) return not_all_caps(name);
    }
  }
  return null;
}

function not_all_caps(name: string): RuleFinding {
  return { code: 'ALL_CAPS', message: `Constant '${name}' should be all caps starting with a letter` };
}
