import { AsyncLocalStorage } from 'node:async_hooks';
import type { TraceTag } from './tags.js';
import { traceEnabled, traceStderrEnabled } from '../util/env.js';
import { jsonLine } from '../util/json.js';

const store = new AsyncLocalStorage<TraceTag[]>();

export async function withTraceLog<T>(fn: () => Promise<T> | T): Promise<{ result: T; tags: TraceTag[] }> {
  if (!traceEnabled()) {
    return { result: await fn(), tags: [] };
  }
  const buf: TraceTag[] = [];
  const result = await store.run(buf, fn);
  return { result, tags: buf.slice() };
}

export function emit(tag: TraceTag): void {
  if (!traceEnabled()) return;
  if (traceStderrEnabled()) {
    process.stderr.write(jsonLine({ ts: Date.now(), tag }) + '\n');
  }
  store.getStore()?.push(tag);
}
