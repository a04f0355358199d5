/**
 * Invariant-culture numeral scanning.
 *
 * Recognizes the three number styles the parsers accept:
 * - integer: optional leading sign and ASCII digits
 * - float:   decimal point, `,` group separators and an exponent, plus the
 *            Infinity / NaN symbols
 * - number:  decimal point and group separators, sign leading or trailing,
 *            no exponent
 * Surrounding whitespace (TAB, LF, VT, FF, CR, SPACE) is allowed in every style.
 */

export type NumberStyle = 'integer' | 'float' | 'number';

export interface FiniteLiteral {
  kind: 'finite';
  negative: boolean;
  /** Integral digits, group separators removed. May be empty (".5"). */
  integral: string;
  /** Fractional digits. May be empty. */
  fraction: string;
  /** Decimal exponent; always 0 outside the float style. */
  exponent: number;
}

export type ScannedLiteral =
  | FiniteLiteral
  | { kind: 'infinity'; negative: boolean }
  | { kind: 'nan' };

const WS = '[\\t\\n\\v\\f\\r ]*';
// group separators only after the first integral digit
const MANTISSA = '(?:(\\d[\\d,]*)(?:\\.(\\d*))?|\\.(\\d+))';

const INTEGER_RE = new RegExp(`^${WS}([+-]?)(\\d+)${WS}$`);
const FLOAT_RE = new RegExp(`^${WS}([+-]?)${MANTISSA}(?:[eE]([+-]?\\d+))?${WS}$`);
const NUMBER_RE = new RegExp(`^${WS}([+-]?)${MANTISSA}${WS}([+-]?)${WS}$`);
const INFINITY_RE = new RegExp(`^${WS}([+-]?)(?:infinity|∞)${WS}$`, 'i');
const NAN_RE = new RegExp(`^${WS}[+-]?nan${WS}$`, 'i');

// Far past the point where any binary64 value rounds to 0 or Infinity.
const EXPONENT_LIMIT = 100_000;

function clampExponent(digits: string): number {
  const e = Number(digits);
  if (e > EXPONENT_LIMIT) return EXPONENT_LIMIT;
  if (e < -EXPONENT_LIMIT) return -EXPONENT_LIMIT;
  return e;
}

function scanInteger(input: string): ScannedLiteral | null {
  const m = INTEGER_RE.exec(input);
  if (!m) return null;
  const [, sign, digits] = m;
  return { kind: 'finite', negative: sign === '-', integral: digits, fraction: '', exponent: 0 };
}

function scanFloat(input: string): ScannedLiteral | null {
  const m = FLOAT_RE.exec(input);
  if (m) {
    const [, sign, integral = '', fraction = '', bareFraction, exp] = m;
    return {
      kind: 'finite',
      negative: sign === '-',
      integral: integral.replace(/,/g, ''),
      fraction: bareFraction ?? fraction,
      exponent: exp === undefined ? 0 : clampExponent(exp),
    };
  }
  const inf = INFINITY_RE.exec(input);
  if (inf) return { kind: 'infinity', negative: inf[1] === '-' };
  if (NAN_RE.test(input)) return { kind: 'nan' };
  return null;
}

function scanNumber(input: string): ScannedLiteral | null {
  const m = NUMBER_RE.exec(input);
  if (!m) return null;
  const [, lead, integral = '', fraction = '', bareFraction, trail] = m;
  if (lead && trail) return null;
  return {
    kind: 'finite',
    negative: (lead || trail) === '-',
    integral: integral.replace(/,/g, ''),
    fraction: bareFraction ?? fraction,
    exponent: 0,
  };
}

/**
 * Scan `input` in the given style. Returns null when the text is not a
 * complete numeral of that style.
 */
export function scanNumeric(input: string, style: NumberStyle): ScannedLiteral | null {
  switch (style) {
    case 'integer':
      return scanInteger(input);
    case 'float':
      return scanFloat(input);
    case 'number':
      return scanNumber(input);
  }
}

/**
 * Significant digits of a finite literal as a single digit string with its
 * power-of-ten exponent: value = ±digits * 10^exponent. Leading zeros are
 * stripped; an all-zero literal yields digits "".
 */
export function significand(lit: FiniteLiteral): { digits: string; exponent: number } {
  const digits = (lit.integral + lit.fraction).replace(/^0+/, '');
  return { digits, exponent: lit.exponent - lit.fraction.length };
}

// Unicode White_Space: U+FEFF is not part of it, U+0085 is
const BLANK_RE = /^[\t\n\v\f\r \u0085\u00a0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]*$/;

/** Empty or whitespace-only text. */
export function isBlank(input: string): boolean {
  return BLANK_RE.test(input);
}
