/**
 * Constants and field access for IEEE 754 `binary16` (half precision) bit
 * patterns.  Halves are carried around as plain numbers holding the
 * unsigned 16-bit pattern.
 *
 * Layout, most significant bit first: sign (1), exponent (5),
 * significand (10).
 *
 * @module
 */

import type {FloatFormat} from './format.ts';

export const FORMAT: FloatFormat = {
  name: 'binary16',
  exponentBits: 5,
  significandBits: 10,
  bias: 15,
};

export const BIAS = 15;

export const MASK_SIGN = 0x8000;
export const MASK_EXPONENT = 0x7c00;
export const MASK_SIGNIFICAND = 0x03ff;

export const POSITIVE_ZERO = 0x0000;
export const NEGATIVE_ZERO = 0x8000;
export const POSITIVE_INFINITY = 0x7c00;
export const NEGATIVE_INFINITY = 0xfc00;

/** Canonical quiet NaN. */
export const NAN = 0x7e00;

/**
 * Is the number an integer in the given range, inclusive?
 *
 * @param n Number to check.
 * @param start First valid number.
 * @param end Last valid number.
 * @param what Name for the error message.
 * @throws {RangeError} On invalid number.
 */
export function intRange(
  n: number,
  start: number,
  end: number,
  what = 'number'
): void {
  if (!Number.isSafeInteger(n) || (n < start) || (n > end)) {
    throw new RangeError(`Invalid ${what} ${n} for range ${start}..${end}`);
  }
}

/**
 * Ensure that a number holds a 16-bit pattern.
 *
 * @param h Possible half.
 * @throws {RangeError} Not an integer in 0..0xffff.
 */
export function checkHalf(h: number): void {
  intRange(h, 0, 0xffff, 'binary16 pattern');
}

/**
 * Unbiased exponent of a half.  `-15` for zero and subnormals, `16` for
 * the infinities and NaN.
 *
 * @param h Half.
 * @returns Exponent.
 */
export function unpackGetExponentUnbiased(h: number): number {
  return ((h & MASK_EXPONENT) >>> 10) - BIAS;
}

/**
 * Sign bit of a half.
 *
 * @param h Half.
 * @returns 0 or 1.
 */
export function unpackGetSign(h: number): 0 | 1 {
  return ((h & MASK_SIGN) >>> 15) === 1 ? 1 : 0;
}

/**
 * Stored 10 significand bits of a half.
 *
 * @param h Half.
 * @returns Significand.
 */
export function unpackGetSignificand(h: number): number {
  return h & MASK_SIGNIFICAND;
}

/**
 * Sign bit in place.  Only the lowest bit of `s` is used.
 *
 * @param s Sign, 0 or 1.
 * @returns Partial pattern.
 */
export function packSetSignUnchecked(s: number): number {
  return (s & 1) << 15;
}

/**
 * Biased exponent in place.  The biased value is masked to 5 bits, so
 * out-of-range exponents wrap.
 *
 * @param e Unbiased exponent, -15..16.
 * @returns Partial pattern.
 */
export function packSetExponentUnbiasedUnchecked(e: number): number {
  return ((e + BIAS) & 0x1f) << 10;
}

/**
 * Significand in place, masked to 10 bits.
 *
 * @param m Significand.
 * @returns Partial pattern.
 */
export function packSetSignificandUnchecked(m: number): number {
  return m & MASK_SIGNIFICAND;
}

/**
 * Build a half from its fields.
 *
 * @param sign 0 or 1.
 * @param exponent Unbiased exponent, -15..16.
 * @param significand 0..1023.
 * @returns Half.
 * @throws {RangeError} Any field out of range.
 */
export function packFields(
  sign: number,
  exponent: number,
  significand: number
): number {
  intRange(sign, 0, 1, 'sign');
  intRange(exponent, -BIAS, BIAS + 1, 'exponent');
  intRange(significand, 0, MASK_SIGNIFICAND, 'significand');
  return packSetSignUnchecked(sign) |
    packSetExponentUnbiasedUnchecked(exponent) |
    packSetSignificandUnchecked(significand);
}

export function isNaN(h: number): boolean {
  return ((h & MASK_EXPONENT) === MASK_EXPONENT) &&
    ((h & MASK_SIGNIFICAND) !== 0);
}

export function isInfinite(h: number): boolean {
  return (h & ~MASK_SIGN) === POSITIVE_INFINITY;
}

export function isZero(h: number): boolean {
  return (h & ~MASK_SIGN) === 0;
}

export function isSubnormal(h: number): boolean {
  return ((h & MASK_EXPONENT) === 0) && ((h & MASK_SIGNIFICAND) !== 0);
}

/**
 * Format a half as `0x` and four lowercase hex digits.
 *
 * @param h Half.
 * @returns String, e.g. "0x3c00".
 */
export function toHex(h: number): string {
  return `0x${(h & 0xffff).toString(16).padStart(4, '0')}`;
}
