import type { OpCode, Position } from '../model/bytecode.js';

export interface Loop {
  kind: 'Loop';
  at: Position;
  acc: bigint;
  swapAt: Position | null;
}

export interface Halt {
  kind: 'Halt';
  acc: bigint;
  swapAt: Position | null;
}

export interface Candidate {
  kind: 'Candidate';
  at: Position;
  op: Extract<OpCode, 'JMP' | 'NOP'>;
  outcome: 'terminated' | 'looped';
}

export interface Repair {
  kind: 'Repair';
  at: Position | null;
  acc: bigint;
}

export interface Warning {
  kind: 'Warning';
  code: string;
  line: number;
}

export type TraceTag =
  | Loop
  | Halt
  | Candidate
  | Repair
  | Warning;
