import type { Instr, Program } from '../model/bytecode.js';
import { program } from '../model/bytecode.js';
import { emit } from '../trace/log.js';

export type ParseWarningCode = 'W_OPERAND_DEFAULTED' | 'W_LINE_SKIPPED';

export interface ParseWarning {
  code: ParseWarningCode;
  line: number;
  text: string;
}

export interface ParseReport {
  program: Program;
  warnings: ParseWarning[];
}

// No `g` flag: the pattern holds no lastIndex between calls.
const LINE = /^(\S+)\s+(\S+)$/;
const OPERAND = /^[+-]\d+$/;

function decodeOp(token: string, arg: bigint): Instr {
  switch (token) {
    case 'acc': return { op: 'ACC', arg };
    case 'jmp': return { op: 'JMP', arg };
    default: return { op: 'NOP', arg };
  }
}

/** Returns the operand value, or null when the token is not `[+-]digits`. */
export function parseOperand(token: string): bigint | null {
  if (!OPERAND.test(token)) return null;
  return BigInt(token);
}

/**
 * Parses `<op> <signed-int>` lines. Parsing never fails: an unreadable
 * operand becomes 0 and a malformed line is dropped, each leaving a warning.
 */
export function parseProgram(text: string): ParseReport {
  const instrs: Instr[] = [];
  const warnings: ParseWarning[] = [];

  text.split(/\r?\n/).forEach((raw, i) => {
    const line = raw.trim();
    if (line.length === 0) return;
    const m = LINE.exec(line);
    if (!m) {
      warnings.push({ code: 'W_LINE_SKIPPED', line: i + 1, text: line });
      emit({ kind: 'Warning', code: 'W_LINE_SKIPPED', line: i + 1 });
      return;
    }
    let arg = parseOperand(m[2]);
    if (arg === null) {
      warnings.push({ code: 'W_OPERAND_DEFAULTED', line: i + 1, text: line });
      emit({ kind: 'Warning', code: 'W_OPERAND_DEFAULTED', line: i + 1 });
      arg = 0n;
    }
    instrs.push(decodeOp(m[1], arg));
  });

  return { program: program(instrs), warnings };
}

export function formatInstr(ins: Instr): string {
  const sign = ins.arg < 0n ? '-' : '+';
  const magnitude = ins.arg < 0n ? -ins.arg : ins.arg;
  return `${ins.op.toLowerCase()} ${sign}${magnitude}`;
}
