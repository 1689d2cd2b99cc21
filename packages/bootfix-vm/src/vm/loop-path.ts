import type { Position } from '../model/bytecode.js';
import type { Transitions } from './interpreter.js';

export type LoopPathErrorCode = 'E_LOOP_START_MISSING' | 'E_LOOP_BROKEN' | 'E_LOOP_NOT_CLOSED';

function describe(code: LoopPathErrorCode, at: Position): string {
  switch (code) {
    case 'E_LOOP_START_MISSING': return `start ${at} was never visited`;
    case 'E_LOOP_BROKEN': return `position ${at} has no recorded successor`;
    case 'E_LOOP_NOT_CLOSED': return `walk revisited ${at} before closing`;
  }
}

export class LoopPathError extends Error {
  constructor(
    readonly code: LoopPathErrorCode,
    readonly at: Position,
  ) {
    super(`${code}: ${describe(code, at)}`);
    this.name = 'LoopPathError';
  }
}

/**
 * Follows `transitions` from `loopStart` until it comes back round, returning
 * every position on the cycle in visitation order, `loopStart` first.
 *
 * The executor only reports loops whose start is reachable from itself, so a
 * throw here means the map and start position did not come from the same run.
 */
export function extractLoop(transitions: Transitions, loopStart: Position): Position[] {
  const path: Position[] = [];
  const seen = new Set<Position>();
  let pos = loopStart;

  for (;;) {
    const next = transitions.get(pos);
    if (next === undefined) {
      throw new LoopPathError(pos === loopStart ? 'E_LOOP_START_MISSING' : 'E_LOOP_BROKEN', pos);
    }
    path.push(pos);
    seen.add(pos);
    if (next === loopStart) return path;
    if (seen.has(next)) throw new LoopPathError('E_LOOP_NOT_CLOSED', next);
    pos = next;
  }
}
