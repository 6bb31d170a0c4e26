export * from './types';
export * from './result';
export * from './pointer';
export * from './problem';
export * from './schema';
export { assert_never } from './utils/exhaustive.util';
export {
  ContractViolationError,
  KindRangeError,
  NotImplementedError,
  UnsupportedNodeError,
} from './utils/errors.util';
