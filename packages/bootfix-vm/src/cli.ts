#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';

import { readProgramSource } from './io/source.js';
import type { Program } from './model/bytecode.js';
import { formatInstr, parseProgram } from './parse/program.js';
import { failure, formatFailure, ok, type Result } from './result.js';
import { programPathFromEnv } from './util/env.js';
import { jsonLine } from './util/json.js';
import { execute } from './vm/interpreter.js';
import { firstLoop, repair } from './vm/repair.js';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface LoadOptions {
  strict?: boolean;
}

export interface RepairOptions extends LoadOptions {
  json?: boolean;
}

const processIO: CliIO = {
  out: (line) => process.stdout.write(line + '\n'),
  err: (line) => process.stderr.write(line + '\n'),
};

export async function loadProgram(file: string, opts: LoadOptions, io: CliIO): Promise<Result<Program>> {
  const source = await readProgramSource(file);
  if (!source.ok) return source;
  const { program, warnings } = parseProgram(source.value);
  if (warnings.length > 0 && opts.strict) {
    return failure('E_PARSE_WARNINGS', `${warnings.length} line(s) of ${file} did not parse cleanly`, { warnings });
  }
  for (const w of warnings) {
    io.err(`warning: line ${w.line}: ${w.code}: ${w.text}`);
  }
  return ok(program);
}

export async function runRepair(file: string, opts: RepairOptions, io: CliIO): Promise<number> {
  const loaded = await loadProgram(file, opts, io);
  if (!loaded.ok) {
    io.err(`error: ${formatFailure(loaded)}`);
    return 1;
  }
  const result = repair(loaded.value);
  if (!result.ok) {
    io.err(`error: ${formatFailure(result)}`);
    return 1;
  }
  const report = result.value;
  if (opts.json) {
    io.out(jsonLine(report));
  } else if (report.swappedAt === null) {
    io.out(`accumulator: ${report.acc}`);
  } else {
    const swapped = formatInstr(loaded.value.instrs[report.swappedAt]);
    io.out(`accumulator: ${report.acc} (swapped ${swapped} at ${report.swappedAt})`);
  }
  return 0;
}

export async function runLoop(file: string, opts: LoadOptions, io: CliIO): Promise<number> {
  const loaded = await loadProgram(file, opts, io);
  if (!loaded.ok) {
    io.err(`error: ${formatFailure(loaded)}`);
    return 1;
  }
  const loop = firstLoop(loaded.value);
  if (loop === null) {
    io.out(`terminated with accumulator ${execute(loaded.value).acc}`);
  } else {
    io.out(`loop at ${loop.at} with accumulator ${loop.acc} (path ${loop.path.join(' -> ')})`);
  }
  return 0;
}

export function buildCli(io: CliIO = processIO): Command {
  const program = new Command();
  program
    .name('bootfix')
    .description('Run a three-opcode program and repair its infinite loop');

  program
    .command('repair')
    .argument('[file]', 'Program file (defaults to $BOOTFIX_PROGRAM or instructions.txt)')
    .option('--json', 'Print the repair report as JSON')
    .option('--strict', 'Fail instead of warning on lines that do not parse cleanly')
    .action(async (file: string | undefined, options: RepairOptions) => {
      process.exitCode = await runRepair(file ?? programPathFromEnv(), options, io);
    });

  program
    .command('loop')
    .argument('[file]', 'Program file (defaults to $BOOTFIX_PROGRAM or instructions.txt)')
    .option('--strict', 'Fail instead of warning on lines that do not parse cleanly')
    .action(async (file: string | undefined, options: LoadOptions) => {
      process.exitCode = await runLoop(file ?? programPathFromEnv(), options, io);
    });

  return program;
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return fileURLToPath(import.meta.url) === realpathSync(resolve(entry));
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  buildCli().parseAsync(process.argv).catch((error) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
