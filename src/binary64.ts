/**
 * Field access for IEEE 754 `binary64` (double precision) values.
 *
 * Layout, most significant bit first: sign (1), exponent (11),
 * significand (52).
 *
 * @module
 */

import type {FloatFormat} from './format.ts';

export const FORMAT: FloatFormat = {
  name: 'binary64',
  exponentBits: 11,
  significandBits: 52,
  bias: 1023,
};

/**
 * The value used to offset the encoded exponent.  An exponent `e` is
 * stored as `BIAS + e`.
 */
export const BIAS = 1023;

export const NEGATIVE_ZERO_BITS = 0x8000000000000000n;
export const MASK_SIGN = 0x8000000000000000n;
export const MASK_EXPONENT = 0x7ff0000000000000n;
export const MASK_SIGNIFICAND = 0x000fffffffffffffn;

/**
 * Get the raw bits of a double.
 *
 * @param d Any number, including NaN and the infinities.
 * @returns Unsigned 64-bit pattern.
 */
export function toBits(d: number): bigint {
  const dv = new DataView(new ArrayBuffer(8));
  dv.setFloat64(0, d);
  return dv.getBigUint64(0);
}

/**
 * Reinterpret a 64-bit pattern as a double.  The JS engine may
 * canonicalize NaN payloads.
 *
 * @param bits Pattern, only the low 64 bits are used.
 * @returns Double.
 */
export function fromBits(bits: bigint): number {
  const dv = new DataView(new ArrayBuffer(8));
  dv.setBigUint64(0, BigInt.asUintN(64, bits));
  return dv.getFloat64(0);
}

/**
 * Extract and unbias the exponent of a double.
 *
 * The stored exponent is in `[0, 2047]`, so this returns:
 *
 * - `-1023` for zero and subnormal numbers
 * - `[-1022, 1023]` for normal numbers
 * - `1024` for the infinities and NaN
 *
 * @param d Double.
 * @returns Unbiased exponent.
 */
export function unpackGetExponentUnbiased(d: number): number {
  const biased = (toBits(d) & MASK_EXPONENT) >> 52n;
  return Number(biased) - BIAS;
}

/**
 * Sign bit of a double.
 *
 * @param d Double.
 * @returns 1 for negative numbers and -0, otherwise 0.
 */
export function unpackGetSign(d: number): 0 | 1 {
  return ((toBits(d) & MASK_SIGN) >> 63n) === 1n ? 1 : 0;
}

/**
 * The stored 52 significand bits of a double, without the implicit
 * leading bit.
 *
 * @param d Double.
 * @returns Significand, always a safe integer.
 */
export function unpackGetSignificand(d: number): number {
  return Number(toBits(d) & MASK_SIGNIFICAND);
}
