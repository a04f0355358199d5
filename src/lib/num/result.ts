import { errorFromFailure, type ParseFailure } from './errors.js';

export type Ok<T> = { ok: true; value: T };
export type Err = { ok: false; error: ParseFailure };
export type Result<T> = Ok<T> | Err;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

export const nullArgument = (): Err => ({ ok: false, error: { code: 'null_argument', raw: null } });
export const formatFailure = (raw: string): Err => ({ ok: false, error: { code: 'format', raw } });
export const overflowFailure = (raw: string): Err => ({ ok: false, error: { code: 'overflow', raw } });

/**
 * Returns the value of a successful result, or throws the NumberParseError
 * subclass matching the failure code.
 */
export function unwrap<T>(r: Result<T>): T {
  if (r.ok) return r.value;
  throw errorFromFailure(r.error);
}

/** Outcome of a try-variant: never throws, zero value on failure. */
export interface TryParseResult<T> {
  success: boolean;
  value: T;
}
