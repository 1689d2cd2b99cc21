import type { Position, Program } from '../model/bytecode.js';
import { emit } from '../trace/log.js';
import { jsonLine } from '../util/json.js';

export type Transitions = ReadonlyMap<Position, Position>;

export type Outcome =
  | { status: 'terminated', acc: bigint, transitions: Transitions }
  | { status: 'looped', acc: bigint, at: Position, transitions: Transitions };

// Jump targets below 0 clamp to 0 rather than wrapping or failing. Well-formed
// programs never reach this, but the behaviour is defined. Anything at or past
// `end` terminates, so it collapses to `end` before leaving bigint range.
function jumpTarget(pos: Position, offset: bigint, end: number): Position {
  const target = BigInt(pos) + offset;
  if (target < 0n) return 0;
  if (target >= BigInt(end)) return end;
  return Number(target);
}

/**
 * Runs `prog` from position 0 with a zeroed accumulator until it either steps
 * past the last instruction or is about to revisit a position.
 *
 * When `swapAt` is given, the JMP/NOP at that position behaves as its
 * counterpart for this run only; the program itself is never touched.
 */
export function execute(prog: Program, swapAt?: Position): Outcome {
  const transitions = new Map<Position, Position>();
  const swap = swapAt ?? null;
  let acc = 0n;
  let pos: Position = 0;

  for (;;) {
    if (transitions.has(pos)) {
      emit({ kind: 'Loop', at: pos, acc, swapAt: swap });
      return { status: 'looped', acc, at: pos, transitions };
    }
    if (pos >= prog.instrs.length) {
      emit({ kind: 'Halt', acc, swapAt: swap });
      return { status: 'terminated', acc, transitions };
    }

    const ins = prog.instrs[pos];
    const swapped = pos === swap;
    let next: Position;
    switch (ins.op) {
      case 'ACC':
        acc += ins.arg;
        next = pos + 1;
        break;
      case 'JMP':
        next = swapped ? pos + 1 : jumpTarget(pos, ins.arg, prog.instrs.length);
        break;
      case 'NOP':
        next = swapped ? jumpTarget(pos, ins.arg, prog.instrs.length) : pos + 1;
        break;
      default: {
        const _: never = ins;
        throw new Error(`unknown opcode: ${jsonLine(_)}`);
      }
    }

    transitions.set(pos, next);
    pos = next;
  }
}
