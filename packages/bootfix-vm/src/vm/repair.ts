import type { Position, Program } from '../model/bytecode.js';
import { failure, ok, type Result } from '../result.js';
import { emit } from '../trace/log.js';
import { execute } from './interpreter.js';
import { extractLoop } from './loop-path.js';

export interface LoopReport {
  at: Position;
  acc: bigint;
  path: Position[];
}

export interface RepairReport {
  acc: bigint;
  swappedAt: Position | null;
  loop: LoopReport | null;
  candidates: Position[];
}

export function firstLoop(prog: Program): LoopReport | null {
  const out = execute(prog);
  if (out.status === 'terminated') return null;
  return { at: out.at, acc: out.acc, path: extractLoop(out.transitions, out.at) };
}

/**
 * Finds the single JMP/NOP swap that lets `prog` run off its end and returns
 * the accumulator of that run. Only positions on the detected cycle are
 * tried; an instruction off the cycle cannot break it.
 */
export function repair(prog: Program): Result<RepairReport> {
  const first = execute(prog);
  if (first.status === 'terminated') {
    emit({ kind: 'Repair', at: null, acc: first.acc });
    return ok({ acc: first.acc, swappedAt: null, loop: null, candidates: [] });
  }

  const loop: LoopReport = {
    at: first.at,
    acc: first.acc,
    path: extractLoop(first.transitions, first.at),
  };
  const candidates: Position[] = [];

  for (const pos of loop.path) {
    const ins = prog.instrs[pos];
    if (ins.op === 'ACC') continue;

    candidates.push(pos);
    const trial = execute(prog, pos);
    emit({ kind: 'Candidate', at: pos, op: ins.op, outcome: trial.status });
    if (trial.status === 'terminated') {
      emit({ kind: 'Repair', at: pos, acc: trial.acc });
      return ok({ acc: trial.acc, swappedAt: pos, loop, candidates });
    }
  }

  return failure(
    'E_NO_REPAIR',
    `no single JMP/NOP swap on the loop at position ${loop.at} lets the program terminate`,
    { loop, candidates },
  );
}
