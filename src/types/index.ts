export type * from './declaration.type';
export type * from './advisory.type';
export type * from './check.type';
export type * from './issue.type';
