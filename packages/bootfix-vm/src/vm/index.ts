export { execute } from './interpreter.js';
export type { Outcome, Transitions } from './interpreter.js';
export { extractLoop, LoopPathError } from './loop-path.js';
export type { LoopPathErrorCode } from './loop-path.js';
export { firstLoop, repair } from './repair.js';
export type { LoopReport, RepairReport } from './repair.js';
