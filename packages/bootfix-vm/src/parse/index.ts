export { formatInstr, parseOperand, parseProgram } from './program.js';
export type { ParseReport, ParseWarning, ParseWarningCode } from './program.js';
