export type ErrorCode =
  | 'E_INPUT_UNREADABLE'
  | 'E_NO_REPAIR'
  | 'E_PARSE_WARNINGS';

export interface Failure {
  code: ErrorCode;
  explain: string;
  details?: unknown;
}

export type Ok<T> = { ok: true; value: T };
export type Err = { ok: false; error: Failure };
export type Result<T> = Ok<T> | Err;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

export const failure = (code: ErrorCode, explain: string, details?: unknown): Err => ({
  ok: false,
  error: {
    code,
    explain,
    ...(typeof details === 'undefined' ? {} : { details }),
  },
});

export const formatFailure = (result: Result<unknown>): string => {
  if (result.ok) return 'ok';
  return `${result.error.code}: ${result.error.explain}`;
};
