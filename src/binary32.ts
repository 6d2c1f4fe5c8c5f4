/**
 * Field access for IEEE 754 `binary32` (single precision) values.
 *
 * Layout, most significant bit first: sign (1), exponent (8),
 * significand (23).  JS has no float32 type, so every input is first
 * rounded to the nearest single, the same way `Math.fround` does.
 *
 * @module
 */

import type {FloatFormat} from './format.ts';

export const FORMAT: FloatFormat = {
  name: 'binary32',
  exponentBits: 8,
  significandBits: 23,
  bias: 127,
};

export const BIAS = 127;

export const NEGATIVE_ZERO_BITS = 0x80000000;
export const MASK_SIGN = 0x80000000;
export const MASK_EXPONENT = 0x7f800000;
export const MASK_SIGNIFICAND = 0x007fffff;

/**
 * Get the raw bits of a number, rounded to single precision.
 *
 * @param f Any number.
 * @returns Unsigned 32-bit pattern.
 */
export function toBits(f: number): number {
  const dv = new DataView(new ArrayBuffer(4));
  dv.setFloat32(0, f);
  return dv.getUint32(0);
}

/**
 * Reinterpret a 32-bit pattern as a single.
 *
 * @param bits Pattern, only the low 32 bits are used.
 * @returns Number, exactly representable as a single.
 */
export function fromBits(bits: number): number {
  const dv = new DataView(new ArrayBuffer(4));
  dv.setUint32(0, bits >>> 0);
  return dv.getFloat32(0);
}

/**
 * Extract and unbias the exponent.  Returns `-127` for zero and
 * subnormals, `128` for the infinities and NaN.
 *
 * @param f Number, rounded to single first.
 * @returns Unbiased exponent.
 */
export function unpackGetExponentUnbiased(f: number): number {
  return ((toBits(f) & MASK_EXPONENT) >>> 23) - BIAS;
}

/**
 * Sign bit.
 *
 * @param f Number.
 * @returns 1 for negative numbers and -0, otherwise 0.
 */
export function unpackGetSign(f: number): 0 | 1 {
  // Unsigned shift; `&` with the sign mask yields a negative int32.
  return (toBits(f) >>> 31) === 1 ? 1 : 0;
}

/**
 * The stored 23 significand bits.
 *
 * @param f Number, rounded to single first.
 * @returns Significand.
 */
export function unpackGetSignificand(f: number): number {
  return toBits(f) & MASK_SIGNIFICAND;
}
