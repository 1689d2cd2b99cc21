export * as model from './model/index.js';
export * as vm from './vm/index.js';
export * as parse from './parse/index.js';
export * as trace from './trace/index.js';
export { readProgramSource } from './io/source.js';
export { failure, formatFailure, ok } from './result.js';
export type { ErrorCode, Failure, Result } from './result.js';
