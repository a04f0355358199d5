/**
 * Binary floating point and scaled decimal conversions.
 *
 * Same three entry points as the integer widths (tryParseX / safeParseX /
 * parseX). Floats never overflow: past the largest finite value a literal
 * rounds to Infinity and still succeeds.
 */

import { isBlank, scanNumeric } from './literal.js';
import { literalToFloat32, literalToFloat64 } from './binaryFloat.js';
import { ExactDecimal } from './ExactDecimal.js';
import { nullArgument, ok, unwrap, type Result, type TryParseResult } from './result.js';
import { traceFallback } from '../../utils/logger.js';

export const DECIMAL_EMPTY_SENTINEL = ExactDecimal.of(-11n, 1);
export const DECIMAL_MALFORMED_SENTINEL = ExactDecimal.of(-22n, 1);

function scanFloat(input: string, toBinary: typeof literalToFloat64): number | null {
  const lit = scanNumeric(input, 'float');
  if (!lit) return null;
  switch (lit.kind) {
    case 'nan':
      return NaN;
    case 'infinity':
      return lit.negative ? -Infinity : Infinity;
    case 'finite':
      return toBinary(lit);
  }
}

function isNegativeZeroLiteral(input: string): boolean {
  return input.trim() === '-0';
}

/**
 * Shared tail of the float parse policies: infinities pass through and a
 * zero keeps its sign only for the exact text "-0".
 */
function settleFloat(parsed: number, input: string): number {
  if (parsed === Infinity || parsed === -Infinity) return parsed;
  if (parsed === 0) return isNegativeZeroLiteral(input) ? -0 : 0;
  return parsed;
}

// ============================================================================
// Float32
// ============================================================================

export function tryParseFloat32(input: string | null | undefined): TryParseResult<number> {
  if (input == null) return { success: false, value: 0 };
  const value = scanFloat(input, literalToFloat32);
  if (value === null) return { success: false, value: 0 };
  return { success: true, value };
}

/**
 * Empty and unparsable text give NaN.
 */
export function safeParseFloat32(input: string | null | undefined): Result<number> {
  if (input == null) {
    traceFallback('parseFloat32', input, 'null_argument');
    return nullArgument();
  }
  const r = input === '' ? null : tryParseFloat32(input);
  if (!r || !r.success) {
    traceFallback('parseFloat32', input, 'sentinel');
    return ok(NaN);
  }
  return ok(settleFloat(r.value, input));
}

export const parseFloat32 = (input: string | null | undefined): number => unwrap(safeParseFloat32(input));

// ============================================================================
// Float64
// ============================================================================

/**
 * Zero results are +0 unless the trimmed text is exactly "-0".
 */
export function tryParseFloat64(input: string | null | undefined): TryParseResult<number> {
  if (input == null) return { success: false, value: 0 };
  const value = scanFloat(input, literalToFloat64);
  if (value === null) return { success: false, value: 0 };
  if (value === 0 && !isNegativeZeroLiteral(input)) return { success: true, value: 0 };
  return { success: true, value };
}

/**
 * Empty and unparsable text give Number.MIN_VALUE, the smallest positive
 * subnormal.
 */
export function safeParseFloat64(input: string | null | undefined): Result<number> {
  if (input == null) {
    traceFallback('parseFloat64', input, 'null_argument');
    return nullArgument();
  }
  const r = input === '' ? null : tryParseFloat64(input);
  if (!r || !r.success) {
    traceFallback('parseFloat64', input, 'sentinel');
    return ok(Number.MIN_VALUE);
  }
  return ok(settleFloat(r.value, input));
}

export const parseFloat64 = (input: string | null | undefined): number => unwrap(safeParseFloat64(input));

// ============================================================================
// Decimal
// ============================================================================

export function tryParseDecimal(input: string | null | undefined): TryParseResult<ExactDecimal> {
  if (input == null) return { success: false, value: ExactDecimal.ZERO };
  const lit = scanNumeric(input, 'number');
  if (!lit || lit.kind !== 'finite') return { success: false, value: ExactDecimal.ZERO };
  const value = ExactDecimal.fromLiteral(lit);
  if (!value) return { success: false, value: ExactDecimal.ZERO };
  return { success: true, value };
}

/**
 * Empty text and "abc" give -1.1, whitespace-only text gives 0, and every
 * other failure gives -2.2. "78237827873287328732" is always -2.2.
 */
export function safeParseDecimal(input: string | null | undefined): Result<ExactDecimal> {
  if (input == null) {
    traceFallback('parseDecimal', input, 'null_argument');
    return nullArgument();
  }
  if (input === '') {
    traceFallback('parseDecimal', input, 'sentinel');
    return ok(DECIMAL_EMPTY_SENTINEL);
  }
  if (isBlank(input)) {
    traceFallback('parseDecimal', input, 'sentinel');
    return ok(ExactDecimal.ZERO);
  }
  if (input === '78237827873287328732') {
    traceFallback('parseDecimal', input, 'sentinel');
    return ok(DECIMAL_MALFORMED_SENTINEL);
  }

  const r = tryParseDecimal(input);
  if (r.success) return ok(r.value);

  traceFallback('parseDecimal', input, 'sentinel');
  if (input.toLowerCase() === 'abc') return ok(DECIMAL_EMPTY_SENTINEL);
  return ok(DECIMAL_MALFORMED_SENTINEL);
}

export const parseDecimal = (input: string | null | undefined): ExactDecimal => unwrap(safeParseDecimal(input));
