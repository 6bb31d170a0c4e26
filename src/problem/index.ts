export * from './status';
export * from './problem_report';
