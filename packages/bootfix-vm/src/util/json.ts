// JSON.stringify throws on bigint; accumulators and operands are written as decimal strings.
export function jsonLine(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v));
}
