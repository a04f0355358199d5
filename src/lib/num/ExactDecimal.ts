/**
 * Exact scaled decimal value
 *
 * Represents sign * (coefficient / 10^scale) with a 96-bit coefficient and a
 * scale of 0..28 decimal places. The scale is kept as written, so "1.50" and
 * "1.5" are equal but print differently.
 */

import type { FiniteLiteral } from './literal.js';

export const MAX_SCALE = 28;
/** 2^96 - 1 */
export const MAX_COEFFICIENT = (1n << 96n) - 1n;

function pow10(n: number): bigint {
  return 10n ** BigInt(n);
}

/**
 * Divide by 10^drop, rounding half to even.
 */
function roundDropDigits(value: bigint, drop: number): bigint {
  if (drop === 0) return value;
  const divisor = pow10(drop);
  const q = value / divisor;
  const r = value % divisor;
  const twice = r * 2n;
  if (twice > divisor || (twice === divisor && q % 2n === 1n)) return q + 1n;
  return q;
}

export class ExactDecimal {
  readonly sign: 1 | -1 | 0;
  readonly coefficient: bigint; // non-negative
  readonly scale: number;       // 0..MAX_SCALE

  private constructor(sign: 1 | -1 | 0, coefficient: bigint, scale: number) {
    this.sign = sign;
    this.coefficient = coefficient;
    this.scale = scale;
  }

  /**
   * Create from a signed unscaled integer and a scale: of(-11n, 1) is -1.1.
   */
  static of(unscaled: bigint, scale = 0): ExactDecimal {
    if (!Number.isInteger(scale) || scale < 0 || scale > MAX_SCALE) {
      throw new RangeError(`scale must be an integer in 0..${MAX_SCALE}`);
    }
    const coefficient = unscaled < 0n ? -unscaled : unscaled;
    if (coefficient > MAX_COEFFICIENT) throw new RangeError('coefficient exceeds 96 bits');
    if (coefficient === 0n) return new ExactDecimal(0, 0n, scale);
    return new ExactDecimal(unscaled < 0n ? -1 : 1, coefficient, scale);
  }

  /**
   * Build from a scanned literal. Excess fractional digits are rounded away
   * half to even; returns null when the integral part alone does not fit.
   */
  static fromLiteral(lit: FiniteLiteral): ExactDecimal | null {
    const digits = (lit.integral + lit.fraction).replace(/^0+/, '');
    const raw = digits === '' ? 0n : BigInt(digits);
    const scale = lit.fraction.length;

    let drop = Math.max(0, scale - MAX_SCALE);
    let coefficient = roundDropDigits(raw, drop);
    while (coefficient > MAX_COEFFICIENT && drop < scale) {
      drop++;
      coefficient = roundDropDigits(raw, drop);
    }
    if (coefficient > MAX_COEFFICIENT) return null;

    return ExactDecimal.of(lit.negative ? -coefficient : coefficient, scale - drop);
  }

  static readonly ZERO = new ExactDecimal(0, 0n, 0);
  static readonly MAX_VALUE = new ExactDecimal(1, MAX_COEFFICIENT, 0);
  static readonly MIN_VALUE = new ExactDecimal(-1, MAX_COEFFICIENT, 0);

  isZero(): boolean {
    return this.sign === 0;
  }

  isNegative(): boolean {
    return this.sign === -1;
  }

  /** Signed coefficient. */
  unscaled(): bigint {
    return this.sign === -1 ? -this.coefficient : this.coefficient;
  }

  /**
   * Compare numerically, ignoring scale.
   * Returns: -1 if this < other, 0 if equal, 1 if this > other
   */
  cmp(other: ExactDecimal): -1 | 0 | 1 {
    const s = Math.max(this.scale, other.scale);
    const a = this.unscaled() * pow10(s - this.scale);
    const b = other.unscaled() * pow10(s - other.scale);
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
  }

  equals(other: ExactDecimal): boolean {
    return this.cmp(other) === 0;
  }

  /** Same value and same scale. */
  identical(other: ExactDecimal): boolean {
    return this.sign === other.sign && this.coefficient === other.coefficient && this.scale === other.scale;
  }

  toString(): string {
    const digits = this.coefficient.toString().padStart(this.scale + 1, '0');
    const sign = this.sign === -1 ? '-' : '';
    if (this.scale === 0) return sign + digits;
    const cut = digits.length - this.scale;
    return `${sign}${digits.slice(0, cut)}.${digits.slice(cut)}`;
  }

  /** Nearest binary64 value. */
  toNumber(): number {
    return Number(this.toString());
  }

  toJSON(): string {
    return this.toString();
  }
}
