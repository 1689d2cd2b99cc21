import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { execute, extractLoop, LoopPathError } from '../src/vm/index.js';
import { program } from '../src/model/bytecode.js';
import type { Instr } from '../src/model/bytecode.js';

const sample = new Map<number, number>([
  [0, 1], [1, 2], [2, 6], [6, 7], [7, 3], [3, 4], [4, 1],
]);

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof LoopPathError) return error.code;
    throw error;
  }
  return undefined;
}

describe('extractLoop', () => {
  it('walks the cycle from its start', () => {
    expect(extractLoop(sample, 1)).toEqual([1, 2, 6, 7, 3, 4]);
  });

  it('handles a self-loop', () => {
    expect(extractLoop(new Map([[0, 0]]), 0)).toEqual([0]);
  });

  it('fails fast when the start was never visited', () => {
    expect(codeOf(() => extractLoop(sample, 5))).toBe('E_LOOP_START_MISSING');
    expect(() => extractLoop(sample, 5)).toThrowError('E_LOOP_START_MISSING: start 5 was never visited');
  });

  it('fails fast when the walk runs out of transitions', () => {
    expect(codeOf(() => extractLoop(new Map([[0, 1]]), 0))).toBe('E_LOOP_BROKEN');
    expect(() => extractLoop(new Map([[0, 1]]), 0)).toThrowError('E_LOOP_BROKEN: position 1 has no recorded successor');
  });

  it('fails fast when the start sits on the lead-in rather than the cycle', () => {
    expect(codeOf(() => extractLoop(sample, 0))).toBe('E_LOOP_NOT_CLOSED');
    expect(() => extractLoop(sample, 0)).toThrowError('E_LOOP_NOT_CLOSED: walk revisited 1 before closing');
  });

  it('closes back on the detected position for any looping run', () => {
    const instrArb: fc.Arbitrary<Instr> = fc.oneof(
      fc.record({ op: fc.constant('ACC' as const), arg: fc.bigInt({ min: -5n, max: 5n }) }),
      fc.record({ op: fc.constant('JMP' as const), arg: fc.bigInt({ min: -6n, max: 6n }) }),
      fc.record({ op: fc.constant('NOP' as const), arg: fc.bigInt({ min: -6n, max: 6n }) }),
    );
    fc.assert(
      fc.property(fc.array(instrArb, { minLength: 1, maxLength: 25 }), (instrs) => {
        const out = execute(program(instrs));
        if (out.status !== 'looped') return;
        const path = extractLoop(out.transitions, out.at);
        expect(path[0]).toBe(out.at);
        expect(out.transitions.get(path[path.length - 1])).toBe(out.at);
        expect(new Set(path).size).toBe(path.length);
      }),
    );
  });
});
