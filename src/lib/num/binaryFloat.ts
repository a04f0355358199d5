import { significand, type FiniteLiteral } from './literal.js';

// binary32 layout
const MANTISSA_BITS = 24; // including the implicit bit
const MIN_EXPONENT = -149; // exponent of the smallest subnormal's LSB
const MAX_EXPONENT = 127 - (MANTISSA_BITS - 1); // LSB exponent of the largest finite value

// Decimal magnitudes outside these bounds are 0 or Infinity without any
// arithmetic: max float32 ~ 3.4e38, half the smallest subnormal ~ 7e-46.
const OVERFLOW_DECIMAL_MAGNITUDE = 40;
const UNDERFLOW_DECIMAL_MAGNITUDE = -47;

function bitLength(n: bigint): number {
  return n === 0n ? 0 : n.toString(2).length;
}

/**
 * Correctly rounded (round half to even) conversion of digits * 10^exp10 to
 * the nearest binary32 magnitude. Returns Infinity past the largest finite
 * value.
 */
function roundToBinary32(digits: bigint, exp10: number): number {
  const num = exp10 >= 0 ? digits * 10n ** BigInt(exp10) : digits;
  const den = exp10 >= 0 ? 1n : 10n ** BigInt(-exp10);

  // choose k so that num / (den * 2^k) lands in [2^23, 2^24)
  let k = bitLength(num) - bitLength(den) - MANTISSA_BITS;
  const scaled = (shift: number): [bigint, bigint] =>
    shift >= 0 ? [num, den << BigInt(shift)] : [num << BigInt(-shift), den];

  let [n, d] = scaled(k);
  if (n / d >= 1n << BigInt(MANTISSA_BITS)) k++;
  if (k < MIN_EXPONENT) k = MIN_EXPONENT;
  [n, d] = scaled(k);

  let q = n / d;
  const twiceRem = (n - q * d) * 2n;
  if (twiceRem > d || (twiceRem === d && (q & 1n) === 1n)) q++;
  if (q === 1n << BigInt(MANTISSA_BITS)) {
    q >>= 1n;
    k++;
  }
  if (k > MAX_EXPONENT) return Infinity;

  // q < 2^24 and k in [-149, 104]: the product is exact in binary64
  return Number(q) * 2 ** k;
}

/**
 * Nearest binary32 value to a finite float-style literal, as a number.
 */
export function literalToFloat32(lit: FiniteLiteral): number {
  const { digits, exponent } = significand(lit);
  const sign = lit.negative ? -1 : 1;
  if (digits === '') return sign * 0;

  const magnitude = digits.length + exponent;
  if (magnitude > OVERFLOW_DECIMAL_MAGNITUDE) return sign * Infinity;
  if (magnitude < UNDERFLOW_DECIMAL_MAGNITUDE) return sign * 0;

  return sign * roundToBinary32(BigInt(digits), exponent);
}

/**
 * Nearest binary64 value to a finite float-style literal. Number() parsing is
 * correctly rounded, so the literal is rebuilt in JavaScript syntax.
 */
export function literalToFloat64(lit: FiniteLiteral): number {
  const { digits, exponent } = significand(lit);
  const sign = lit.negative ? '-' : '';
  if (digits === '') return Number(`${sign}0`);
  return Number(`${sign}${digits}e${exponent}`);
}
