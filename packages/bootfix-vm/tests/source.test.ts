import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readProgramSource } from '../src/io/source.js';

describe('readProgramSource', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'bootfix-source-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns the file text', async () => {
    const file = path.join(dir, 'prog.txt');
    await writeFile(file, 'acc +1\n', 'utf-8');
    expect(await readProgramSource(file)).toEqual({ ok: true, value: 'acc +1\n' });
  });

  it('fails with E_INPUT_UNREADABLE for a missing file', async () => {
    const file = path.join(dir, 'missing.txt');
    const result = await readProgramSource(file);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('E_INPUT_UNREADABLE');
      expect(result.error.explain).toBe(`cannot read program from ${file}`);
    }
  });

  it('fails when the path is a directory', async () => {
    const result = await readProgramSource(dir);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('E_INPUT_UNREADABLE');
    }
  });
});
