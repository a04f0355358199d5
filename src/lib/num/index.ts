/**
 * Invariant numeric text conversions
 *
 * try*  : `{ success, value }`, never throws
 * safe* : per-type sentinel/failure policy as a Result
 * parse*: safe* unwrapped, throws NumberParseError subclasses
 */

export {
  tryParseInt8,
  safeParseInt8,
  parseInt8,
  tryParseUInt8,
  safeParseUInt8,
  parseUInt8,
  tryParseInt16,
  safeParseInt16,
  parseInt16,
  tryParseUInt16,
  safeParseUInt16,
  parseUInt16,
  tryParseInt32,
  safeParseInt32,
  parseInt32,
  tryParseUInt32,
  safeParseUInt32,
  parseUInt32,
  tryParseInt64,
  safeParseInt64,
  parseInt64,
  tryParseUInt64,
  safeParseUInt64,
  parseUInt64,
  tryParseIntegerOf,
  INT8,
  UINT8,
  INT16,
  UINT16,
  INT32,
  UINT32,
  INT64,
  UINT64
} from './integer.js';

export type { IntegerKind } from './integer.js';

export {
  tryParseFloat32,
  safeParseFloat32,
  parseFloat32,
  tryParseFloat64,
  safeParseFloat64,
  parseFloat64,
  tryParseDecimal,
  safeParseDecimal,
  parseDecimal,
  DECIMAL_EMPTY_SENTINEL,
  DECIMAL_MALFORMED_SENTINEL
} from './real.js';

export { ExactDecimal, MAX_COEFFICIENT, MAX_SCALE } from './ExactDecimal.js';

export {
  NumberParseError,
  NullArgumentError,
  NumberFormatError,
  NumberOverflowError,
  errorFromFailure
} from './errors.js';

export type { ParseFailure, ParseFailureCode } from './errors.js';

export { unwrap } from './result.js';

export type { Result, Ok, Err, TryParseResult } from './result.js';

export { scanNumeric } from './literal.js';

export type { NumberStyle, ScannedLiteral, FiniteLiteral } from './literal.js';
