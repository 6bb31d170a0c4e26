export * from './kind';
export * from './validation_error';
export * from './result';
