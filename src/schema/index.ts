export * from './result.schema';
export * from './problem.schema';
export * from './codec';
