export * from './tags.js';
export { emit, withTraceLog } from './log.js';
