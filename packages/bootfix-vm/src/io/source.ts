import { readFile } from 'node:fs/promises';
import { failure, ok, type Result } from '../result.js';

export async function readProgramSource(path: string): Promise<Result<string>> {
  try {
    return ok(await readFile(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return failure('E_INPUT_UNREADABLE', `cannot read program from ${path}`, { reason });
  }
}
