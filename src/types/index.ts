export * from './kind.type';
export type * from './result.type';
export type * from './problem.type';
