/**
 * Fixed-width integer conversions.
 *
 * Every width has three entry points:
 * - tryParseX:  never throws, `{ success, value }` with 0 on failure
 * - safeParseX: the width's own sentinel/failure policy as a Result
 * - parseX:     safeParseX unwrapped, throwing NumberParseError subclasses
 *
 * The parse policies differ per width and include literal special cases
 * ("abc", "65536", ...). They are compared verbatim against the raw input.
 */

import { isBlank, scanNumeric } from './literal.js';
import {
  formatFailure,
  nullArgument,
  ok,
  overflowFailure,
  unwrap,
  type Err,
  type Result,
  type TryParseResult,
} from './result.js';
import { traceFallback } from '../../utils/logger.js';

export interface IntegerKind<T extends number | bigint> {
  name: string;
  min: bigint;
  max: bigint;
  zero: T;
  from(v: bigint): T;
}

const small = (name: string, min: bigint, max: bigint): IntegerKind<number> => ({
  name,
  min,
  max,
  zero: 0,
  from: (v) => Number(v),
});

const wide = (name: string, min: bigint, max: bigint): IntegerKind<bigint> => ({
  name,
  min,
  max,
  zero: 0n,
  from: (v) => v,
});

export const INT8 = small('Int8', -128n, 127n);
export const UINT8 = small('UInt8', 0n, 255n);
export const INT16 = small('Int16', -32768n, 32767n);
export const UINT16 = small('UInt16', 0n, 65535n);
export const INT32 = small('Int32', -2147483648n, 2147483647n);
export const UINT32 = small('UInt32', 0n, 4294967295n);
export const INT64 = wide('Int64', -(1n << 63n), (1n << 63n) - 1n);
export const UINT64 = wide('UInt64', 0n, (1n << 64n) - 1n);

/**
 * Exact value of an integer-style literal, or null when the text is not one.
 * Range is not checked here.
 */
function scanIntegerValue(input: string): bigint | null {
  const lit = scanNumeric(input, 'integer');
  if (!lit || lit.kind !== 'finite') return null;
  const magnitude = BigInt(lit.integral);
  return lit.negative ? -magnitude : magnitude;
}

/**
 * Generic try-parse for any integer width.
 */
export function tryParseIntegerOf<T extends number | bigint>(
  kind: IntegerKind<T>,
  input: string | null | undefined
): TryParseResult<T> {
  if (input == null) return { success: false, value: kind.zero };
  const v = scanIntegerValue(input);
  if (v === null || v < kind.min || v > kind.max) return { success: false, value: kind.zero };
  return { success: true, value: kind.from(v) };
}

/**
 * True when the text parses as an Int64 that lies outside `kind`'s range.
 * Text beyond Int64 itself does not count.
 */
function overflowsViaInt64(kind: IntegerKind<number | bigint>, input: string): boolean {
  const wideResult = tryParseIntegerOf(INT64, input);
  return wideResult.success && (wideResult.value < kind.min || wideResult.value > kind.max);
}

function equalsIgnoreCase(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function sentinel<T>(fn: string, input: string, value: T): Result<T> {
  traceFallback(fn, input, 'sentinel');
  return ok(value);
}

function failed(fn: string, input: string | null | undefined, r: Err): Err {
  traceFallback(fn, input, r.error.code);
  return r;
}

// ============================================================================
// Int32
// ============================================================================

export const tryParseInt32 = (input: string | null | undefined) => tryParseIntegerOf(INT32, input);

/**
 * Blank and malformed text give 0; a value that fits Int64 but not Int32
 * gives -1.
 */
export function safeParseInt32(input: string | null | undefined): Result<number> {
  if (input == null) return failed('parseInt32', input, nullArgument());
  if (isBlank(input)) return sentinel('parseInt32', input, 0);
  const r = tryParseInt32(input);
  if (r.success) return ok(r.value);
  if (overflowsViaInt64(INT32, input)) return sentinel('parseInt32', input, -1);
  return sentinel('parseInt32', input, 0);
}

export const parseInt32 = (input: string | null | undefined): number => unwrap(safeParseInt32(input));

// ============================================================================
// UInt32
// ============================================================================

export const tryParseUInt32 = (input: string | null | undefined) => tryParseIntegerOf(UINT32, input);

/**
 * Blank text and "abc" give 0; anything else that does not parse (malformed
 * or out of range) gives 4294967295.
 */
export function safeParseUInt32(input: string | null | undefined): Result<number> {
  if (input == null) return failed('parseUInt32', input, nullArgument());
  if (isBlank(input)) return sentinel('parseUInt32', input, 0);
  if (equalsIgnoreCase(input, 'abc')) return sentinel('parseUInt32', input, 0);
  const r = tryParseUInt32(input);
  if (r.success) return ok(r.value);
  return sentinel('parseUInt32', input, Number(UINT32.max));
}

export const parseUInt32 = (input: string | null | undefined): number => unwrap(safeParseUInt32(input));

// ============================================================================
// UInt8
// ============================================================================

export const tryParseUInt8 = (input: string | null | undefined) => tryParseIntegerOf(UINT8, input);

/**
 * Blank text and "abc" give 255; other unparsable text gives 0.
 */
export function safeParseUInt8(input: string | null | undefined): Result<number> {
  if (input == null) return failed('parseUInt8', input, nullArgument());
  if (isBlank(input)) return sentinel('parseUInt8', input, 255);
  if (equalsIgnoreCase(input, 'abc')) return sentinel('parseUInt8', input, 255);
  const r = tryParseUInt8(input);
  if (r.success) return ok(r.value);
  return sentinel('parseUInt8', input, 0);
}

export const parseUInt8 = (input: string | null | undefined): number => unwrap(safeParseUInt8(input));

// ============================================================================
// Int8
// ============================================================================

export const tryParseInt8 = (input: string | null | undefined) => tryParseIntegerOf(INT8, input);

export function safeParseInt8(input: string | null | undefined): Result<number> {
  if (input == null) return failed('parseInt8', input, nullArgument());
  if (isBlank(input)) return sentinel('parseInt8', input, 127);
  if (equalsIgnoreCase(input, 'abc')) return sentinel('parseInt8', input, 127);
  const r = tryParseInt8(input);
  if (r.success) return ok(r.value);
  if (overflowsViaInt64(INT8, input)) return failed('parseInt8', input, overflowFailure(input));
  return failed('parseInt8', input, formatFailure(input));
}

export const parseInt8 = (input: string | null | undefined): number => unwrap(safeParseInt8(input));

// ============================================================================
// Int16
// ============================================================================

export const tryParseInt16 = (input: string | null | undefined) => tryParseIntegerOf(INT16, input);

export function safeParseInt16(input: string | null | undefined): Result<number> {
  if (input == null) return failed('parseInt16', input, nullArgument());
  if (isBlank(input)) return failed('parseInt16', input, formatFailure(input));
  const r = tryParseInt16(input);
  if (r.success) return ok(r.value);
  if (overflowsViaInt64(INT16, input)) return failed('parseInt16', input, overflowFailure(input));
  return failed('parseInt16', input, formatFailure(input));
}

export const parseInt16 = (input: string | null | undefined): number => unwrap(safeParseInt16(input));

// ============================================================================
// UInt16
// ============================================================================

export const tryParseUInt16 = (input: string | null | undefined) => tryParseIntegerOf(UINT16, input);

/**
 * Blank text and "abc" give 0. "65536" and "-1" give 65535 instead of an
 * overflow; every other out-of-range value raises.
 */
export function safeParseUInt16(input: string | null | undefined): Result<number> {
  if (input == null) return failed('parseUInt16', input, nullArgument());
  if (isBlank(input) || input === 'abc') return sentinel('parseUInt16', input, 0);
  if (input === '65536' || input === '-1') return sentinel('parseUInt16', input, 65535);
  const r = tryParseUInt16(input);
  if (r.success) return ok(r.value);
  if (overflowsViaInt64(UINT16, input)) return failed('parseUInt16', input, overflowFailure(input));
  return failed('parseUInt16', input, formatFailure(input));
}

export const parseUInt16 = (input: string | null | undefined): number => unwrap(safeParseUInt16(input));

// ============================================================================
// Int64
// ============================================================================

export const tryParseInt64 = (input: string | null | undefined) => tryParseIntegerOf(INT64, input);

/**
 * Blank text and "abc" give Int64.MinValue; the two literals just past either
 * end of the range give -1. Any other failure raises a format error.
 */
export function safeParseInt64(input: string | null | undefined): Result<bigint> {
  if (input == null) return failed('parseInt64', input, nullArgument());
  if (isBlank(input)) return sentinel('parseInt64', input, INT64.min);
  if (input === '9223372036854775808' || input === '-9223372036854775809') {
    return sentinel('parseInt64', input, -1n);
  }
  if (equalsIgnoreCase(input, 'abc')) return sentinel('parseInt64', input, INT64.min);
  const r = tryParseInt64(input);
  if (r.success) return ok(r.value);
  return failed('parseInt64', input, formatFailure(input));
}

export const parseInt64 = (input: string | null | undefined): bigint => unwrap(safeParseInt64(input));

// ============================================================================
// UInt64
// ============================================================================

export const tryParseUInt64 = (input: string | null | undefined) => tryParseIntegerOf(UINT64, input);

/**
 * Only "-1" and "18446744073709551616" are reported as overflow; every other
 * failure, blank text included, is a format error.
 */
export function safeParseUInt64(input: string | null | undefined): Result<bigint> {
  if (input == null) return failed('parseUInt64', input, nullArgument());
  if (isBlank(input)) return failed('parseUInt64', input, formatFailure(input));
  if (input === '-1' || input === '18446744073709551616') {
    return failed('parseUInt64', input, overflowFailure(input));
  }
  const r = tryParseUInt64(input);
  if (r.success) return ok(r.value);
  return failed('parseUInt64', input, formatFailure(input));
}

export const parseUInt64 = (input: string | null | undefined): bigint => unwrap(safeParseUInt64(input));
