import type { ValidationIssue } from '../types';

export * from './declaration.schema';

/** 构造统一的校验问题对象 */
export function issue(
  code: string,
  path: string,
  message: string,
  hint?: string
): ValidationIssue {
  return { code, path, message, hint };
}
