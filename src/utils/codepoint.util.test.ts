import { describe, it, expect } from 'vitest';

import { code_points, is_digit, is_lower, is_upper } from './codepoint.util';

describe('codepoint.util', () => {
  it('classifies ASCII letters and digits', () => {
    expect(is_upper('A')).toBe(true);
    expect(is_upper('a')).toBe(false);
    expect(is_lower('a')).toBe(true);
    expect(is_lower('A')).toBe(false);
    expect(is_digit('7')).toBe(true);
    expect(is_digit('x')).toBe(false);
  });

  it('uses Unicode case properties beyond ASCII', () => {
    expect(is_upper('Ä')).toBe(true);
    expect(is_lower('é')).toBe(true);
    // 无大小写的字符两边都不是
    expect(is_upper('日')).toBe(false);
    expect(is_lower('日')).toBe(false);
    expect(is_upper('_')).toBe(false);
    expect(is_lower('_')).toBe(false);
    // 全角数字属于 Nd
    expect(is_digit('３')).toBe(true);
  });

  it('treats a surrogate pair as one code point', () => {
    // U+1D400 MATHEMATICAL BOLD CAPITAL A
    const bold_a = '\u{1D400}';
    expect(bold_a.length).toBe(2);
    expect(code_points(`x${bold_a}y`)).toEqual(['x', bold_a, 'y']);
    expect(is_upper(bold_a)).toBe(true);
  });

  it('returns no code points for an empty string', () => {
    expect(code_points('')).toEqual([]);
  });
});
