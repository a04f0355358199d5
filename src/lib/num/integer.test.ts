import { describe, test, expect } from '@jest/globals';
import {
  INT16,
  tryParseIntegerOf,
  tryParseInt8,
  tryParseUInt8,
  tryParseInt16,
  tryParseUInt16,
  tryParseInt32,
  tryParseUInt32,
  tryParseInt64,
  tryParseUInt64,
  parseInt8,
  parseUInt8,
  parseInt16,
  parseUInt16,
  parseInt32,
  parseUInt32,
  parseInt64,
  parseUInt64,
  safeParseInt16,
  safeParseInt32,
  safeParseUInt64,
} from './integer.js';
import { NullArgumentError, NumberFormatError, NumberOverflowError, NumberParseError } from './errors.js';

describe('integer try-parse', () => {
  test('accepts sign and surrounding whitespace', () => {
    expect(tryParseInt32('42')).toEqual({ success: true, value: 42 });
    expect(tryParseInt32('  -17 ')).toEqual({ success: true, value: -17 });
    expect(tryParseInt32('+5')).toEqual({ success: true, value: 5 });
    expect(tryParseInt32('\t007\n')).toEqual({ success: true, value: 7 });
  });

  test('range boundaries per width', () => {
    expect(tryParseInt8('-128')).toEqual({ success: true, value: -128 });
    expect(tryParseInt8('128')).toEqual({ success: false, value: 0 });
    expect(tryParseUInt8('255')).toEqual({ success: true, value: 255 });
    expect(tryParseUInt8('256')).toEqual({ success: false, value: 0 });
    expect(tryParseInt16('32767')).toEqual({ success: true, value: 32767 });
    expect(tryParseInt16('-32769')).toEqual({ success: false, value: 0 });
    expect(tryParseUInt16('65535')).toEqual({ success: true, value: 65535 });
    expect(tryParseInt32('2147483647')).toEqual({ success: true, value: 2147483647 });
    expect(tryParseInt32('-2147483648')).toEqual({ success: true, value: -2147483648 });
    expect(tryParseInt32('2147483648')).toEqual({ success: false, value: 0 });
    expect(tryParseUInt32('4294967295')).toEqual({ success: true, value: 4294967295 });
  });

  test('64-bit widths are exact bigints', () => {
    expect(tryParseInt64('9223372036854775807')).toEqual({ success: true, value: 9223372036854775807n });
    expect(tryParseInt64('-9223372036854775808')).toEqual({ success: true, value: -9223372036854775808n });
    expect(tryParseInt64('9223372036854775808')).toEqual({ success: false, value: 0n });
    expect(tryParseUInt64('18446744073709551615')).toEqual({ success: true, value: 18446744073709551615n });
    expect(tryParseUInt64('18446744073709551616')).toEqual({ success: false, value: 0n });
  });

  test('unsigned widths take negative zero but no other negative', () => {
    expect(tryParseUInt32('-0')).toEqual({ success: true, value: 0 });
    expect(tryParseUInt32('-1')).toEqual({ success: false, value: 0 });
    expect(tryParseUInt64('-00')).toEqual({ success: true, value: 0n });
  });

  test('rejects malformed and absent input without throwing', () => {
    for (const input of ['', '   ', 'abc', '1.5', '1,000', '1e3', '4 2', '--1', '٣', '0x10', null, undefined]) {
      expect(tryParseInt32(input)).toEqual({ success: false, value: 0 });
    }
    expect(tryParseInt64(null)).toEqual({ success: false, value: 0n });
  });

  test('generic entry point uses the given width', () => {
    expect(tryParseIntegerOf(INT16, ' 12 ')).toEqual({ success: true, value: 12 });
    expect(tryParseIntegerOf(INT16, '40000')).toEqual({ success: false, value: 0 });
  });
});

describe('parseInt32', () => {
  test('overflow within Int64 gives -1', () => {
    expect(parseInt32('2147483648')).toBe(-1);
    expect(parseInt32('-2147483649')).toBe(-1);
  });

  test('blank and malformed give 0', () => {
    expect(parseInt32('')).toBe(0);
    expect(parseInt32('   ')).toBe(0);
    expect(parseInt32('abc')).toBe(0);
    expect(parseInt32('99999999999999999999')).toBe(0);
  });

  test('valid text and null', () => {
    expect(parseInt32('12')).toBe(12);
    expect(() => parseInt32(null)).toThrow(NullArgumentError);
    expect(safeParseInt32(null)).toEqual({ ok: false, error: { code: 'null_argument', raw: null } });
  });
});

describe('parseUInt32', () => {
  test('blank and abc give 0', () => {
    expect(parseUInt32('')).toBe(0);
    expect(parseUInt32(' ')).toBe(0);
    expect(parseUInt32('ABC')).toBe(0);
  });

  test('other failures give the maximum', () => {
    expect(parseUInt32('xyz')).toBe(4294967295);
    expect(parseUInt32('4294967296')).toBe(4294967295);
    expect(parseUInt32('-1')).toBe(4294967295);
  });

  test('valid text', () => {
    expect(parseUInt32('7')).toBe(7);
    expect(() => parseUInt32(undefined)).toThrow(NullArgumentError);
  });
});

describe('parseUInt8', () => {
  test('blank and abc give 255', () => {
    expect(parseUInt8('')).toBe(255);
    expect(parseUInt8(' ')).toBe(255);
    expect(parseUInt8('Abc')).toBe(255);
  });

  test('blank follows the Unicode whitespace set', () => {
    expect(parseUInt8('\u0085')).toBe(255);
    expect(parseUInt8('\u3000\u2028')).toBe(255);
    expect(parseUInt8('\uFEFF')).toBe(0);
  });

  test('other failures give 0', () => {
    expect(parseUInt8('xyz')).toBe(0);
    expect(parseUInt8('256')).toBe(0);
  });

  test('valid text', () => {
    expect(parseUInt8('200')).toBe(200);
  });
});

describe('parseInt8', () => {
  test('blank and abc give 127', () => {
    expect(parseInt8('')).toBe(127);
    expect(parseInt8('   ')).toBe(127);
    expect(parseInt8('abc')).toBe(127);
  });

  test('raises overflow and format errors', () => {
    expect(() => parseInt8('128')).toThrow(NumberOverflowError);
    expect(() => parseInt8('128')).toThrow('Error! Overflow Exception!');
    expect(() => parseInt8('1.5')).toThrow(NumberFormatError);
    expect(() => parseInt8('1.5')).toThrow('Error! Format Exception!');
    // beyond Int64 is not recognized as overflow
    expect(() => parseInt8('99999999999999999999')).toThrow(NumberFormatError);
  });

  test('valid text', () => {
    expect(parseInt8('-5')).toBe(-5);
  });

  test('thrown error carries code and input', () => {
    let caught: unknown;
    try {
      parseInt8('300');
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(NumberParseError);
    expect(caught).toMatchObject({ name: 'NumberOverflowError', code: 'overflow', raw: '300' });
  });
});

describe('parseInt16', () => {
  test('blank is a format error', () => {
    expect(() => parseInt16('')).toThrow(NumberFormatError);
    expect(() => parseInt16(' ')).toThrow(NumberFormatError);
  });

  test('overflow and malformed', () => {
    expect(() => parseInt16('32768')).toThrow(NumberOverflowError);
    expect(() => parseInt16('-32769')).toThrow(NumberOverflowError);
    expect(() => parseInt16('x')).toThrow(NumberFormatError);
    expect(safeParseInt16('32768')).toEqual({ ok: false, error: { code: 'overflow', raw: '32768' } });
  });

  test('valid text', () => {
    expect(parseInt16('-300')).toBe(-300);
  });
});

describe('parseUInt16', () => {
  test('literal special cases', () => {
    expect(parseUInt16('65536')).toBe(65535);
    expect(parseUInt16('-1')).toBe(65535);
    expect(parseUInt16('abc')).toBe(0);
    expect(parseUInt16('')).toBe(0);
  });

  test('special cases compare the raw text exactly', () => {
    expect(() => parseUInt16('ABC')).toThrow(NumberFormatError);
    expect(() => parseUInt16(' 65536')).toThrow(NumberOverflowError);
  });

  test('other out-of-range values raise', () => {
    expect(() => parseUInt16('65537')).toThrow(NumberOverflowError);
    expect(() => parseUInt16('-2')).toThrow(NumberOverflowError);
  });

  test('valid text', () => {
    expect(parseUInt16('42')).toBe(42);
  });
});

describe('parseInt64', () => {
  test('sentinels', () => {
    expect(parseInt64('')).toBe(-9223372036854775808n);
    expect(parseInt64('9223372036854775808')).toBe(-1n);
    expect(parseInt64('-9223372036854775809')).toBe(-1n);
    expect(parseInt64('aBc')).toBe(-9223372036854775808n);
  });

  test('other failures are format errors', () => {
    expect(() => parseInt64('9223372036854775809')).toThrow(NumberFormatError);
    expect(() => parseInt64('12x')).toThrow(NumberFormatError);
  });

  test('valid text', () => {
    expect(parseInt64('123')).toBe(123n);
    expect(() => parseInt64(null)).toThrow(NullArgumentError);
  });
});

describe('parseUInt64', () => {
  test('blank is a format error', () => {
    expect(() => parseUInt64('   ')).toThrow(NumberFormatError);
  });

  test('only the two literals overflow', () => {
    expect(() => parseUInt64('-1')).toThrow(NumberOverflowError);
    expect(() => parseUInt64('18446744073709551616')).toThrow(NumberOverflowError);
    expect(() => parseUInt64('18446744073709551617')).toThrow(NumberFormatError);
    expect(() => parseUInt64('-2')).toThrow(NumberFormatError);
    expect(safeParseUInt64('-1')).toEqual({ ok: false, error: { code: 'overflow', raw: '-1' } });
  });

  test('valid text', () => {
    expect(parseUInt64('18446744073709551615')).toBe(18446744073709551615n);
  });
});
