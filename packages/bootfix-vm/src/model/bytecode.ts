export type Position = number;

// Operands are unbounded; a jump only becomes a Position once it lands in range.
export type Instr =
  | { op: 'ACC', arg: bigint }
  | { op: 'JMP', arg: bigint }
  | { op: 'NOP', arg: bigint };

export type OpCode = Instr['op'];

export interface Program {
  readonly instrs: readonly Instr[];
}

export function program(instrs: readonly Instr[]): Program {
  return { instrs: Object.freeze([...instrs]) };
}
