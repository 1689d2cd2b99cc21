// Centralized, cached environment configuration for the runtime.
export const DEFAULT_PROGRAM_PATH = 'instructions.txt';

let _trace: boolean | undefined;
let _traceStderr: boolean | undefined;

function flag(name: string): boolean {
  const v = (process.env[name] || '').toLowerCase();
  return v === '1' || v === 'true';
}

export function traceEnabled(): boolean {
  if (_trace === undefined) {
    _trace = flag('BOOTFIX_TRACE');
  }
  return _trace;
}

export function traceStderrEnabled(): boolean {
  if (_traceStderr === undefined) {
    _traceStderr = flag('BOOTFIX_TRACE_STDERR');
  }
  return _traceStderr;
}

// Not cached: the CLI resolves it once per invocation.
export function programPathFromEnv(): string {
  const v = process.env.BOOTFIX_PROGRAM;
  return v && v.trim().length > 0 ? v : DEFAULT_PROGRAM_PATH;
}

// For tests only: reset the cached flags.
export function resetEnvCacheForTests(): void {
  _trace = undefined;
  _traceStderr = undefined;
}
