/**
 * 单个 code point 的 Unicode 分类判断。
 * 入参应是 for...of / Array.from 迭代字符串得到的一个元素（可能是代理对）。
 */

const UPPER = /^\p{Uppercase}$/u;
const LOWER = /^\p{Lowercase}$/u;
const DIGIT = /^\p{Nd}$/u;

export function is_upper(cp: string): boolean {
  return UPPER.test(cp);
}

export function is_lower(cp: string): boolean {
  return LOWER.test(cp);
}

export function is_digit(cp: string): boolean {
  return DIGIT.test(cp);
}

/** 按 code point 拆分（代理对算一个单位） */
export function code_points(text: string): string[] {
  return Array.from(text);
}
