import * as Binary32 from './binary32.ts';
import * as Binary64 from './binary64.ts';
import {
  BIAS,
  MASK_EXPONENT,
  MASK_SIGNIFICAND,
  NAN,
  POSITIVE_INFINITY,
  checkHalf,
  unpackGetSign,
} from './binary16.ts';
import {
  type FloatFormat,
  type UnpackedFloat,
  assemble,
  maxExponent,
} from './format.ts';
import {assert} from '@cto.af/utils';

/**
 * Shift right, rounding to nearest with ties to even.
 *
 * @param v Unsigned value.
 * @param shift Number of bits to drop, at least one.
 * @returns Rounded value.  May carry into one bit above the kept width.
 */
function roundShift(v: bigint, shift: number): bigint {
  assert(shift > 0, 'Rounding must drop at least one bit');
  const n = BigInt(shift);
  const kept = v >> n;
  const rest = v & ((1n << n) - 1n);
  const half = 1n << (n - 1n);
  if ((rest > half) || ((rest === half) && ((kept & 1n) === 1n))) {
    return kept + 1n;
  }
  return kept;
}

/**
 * Round a wider float, already split into fields, to a half.
 *
 * @param fmt Format of the source.
 * @param f Source fields.
 * @returns Half.
 */
function narrow(fmt: FloatFormat, f: UnpackedFloat): number {
  const m = fmt.significandBits;
  const sign = f.sign << 15;

  if (f.exponent === maxExponent(fmt)) {
    if (f.significand === 0n) {
      return sign | POSITIVE_INFINITY;
    }
    // Quiet bit forced on, so the significand can't end up zero.
    return sign | NAN | Number(f.significand >> BigInt(m - 10));
  }

  // Zero, or a wide subnormal, which is far below 2**-25.
  if (f.exponent === 0) {
    return sign;
  }

  const e = f.exponent - fmt.bias;
  if (e > BIAS) {
    return sign | POSITIVE_INFINITY;
  }
  if (e < -25) {
    // Less than half of the smallest subnormal.
    return sign;
  }

  const full = f.significand | (1n << BigInt(m));
  if (e >= 1 - BIAS) {
    // 1024..2048.  Adding instead of or-ing lets a carry out of the
    // significand bump the exponent, up to and including Infinity.
    const r = Number(roundShift(full, m - 10));
    return sign | (((e + BIAS) << 10) + (r - 1024));
  }

  // Subnormal.  Rounding up to 1024 yields the smallest normal.
  return sign | Number(roundShift(full, (1 - BIAS - e) + (m - 10)));
}

/**
 * Widen a half into another format.  Exact.
 *
 * @param fmt Target format.
 * @param h Half.
 * @returns Bit pattern in the target format.
 * @throws {RangeError} If h is not a 16-bit pattern.
 */
function widen(fmt: FloatFormat, h: number): bigint {
  checkHalf(h);
  const sign = unpackGetSign(h);
  const exp = (h & MASK_EXPONENT) >>> 10;
  const sig = h & MASK_SIGNIFICAND;
  const m = fmt.significandBits;
  const shifted = BigInt(sig) << BigInt(m - 10);

  if (exp === 0) {
    if (sig === 0) {
      return assemble(fmt, {sign, exponent: 0, significand: 0n});
    }
    // Subnormal: value is sig * 2**-24.  Renormalize on the leading bit.
    const p = 31 - Math.clz32(sig);
    return assemble(fmt, {
      sign,
      exponent: p - 24 + fmt.bias,
      significand: BigInt(sig ^ (1 << p)) << BigInt(m - p),
    });
  }

  if (exp === 0x1f) {
    // Infinity when sig is 0, otherwise NaN with the payload on top.
    return assemble(fmt, {sign, exponent: maxExponent(fmt), significand: shifted});
  }

  return assemble(fmt, {
    sign,
    exponent: exp - BIAS + fmt.bias,
    significand: shifted,
  });
}

/**
 * Convert a double to the nearest half, ties to even.  Values too large
 * become Infinity, values too small become zero, both keeping the sign.
 * NaN stays NaN, keeping the sign and as much of the payload as fits.
 *
 * @param d Any number.
 * @returns Unsigned 16-bit pattern.
 */
export function packDouble(d: number): number {
  return narrow(Binary64.FORMAT, {
    sign: Binary64.unpackGetSign(d),
    exponent: Binary64.unpackGetExponentUnbiased(d) + Binary64.BIAS,
    significand: BigInt(Binary64.unpackGetSignificand(d)),
  });
}

/**
 * Round to single precision, then to half.  This rounds twice, so
 * results can differ from packDouble when the input was not already a
 * single.
 *
 * @param f Number, treated as a float.
 * @returns Unsigned 16-bit pattern.
 */
export function packFloat(f: number): number {
  return narrow(Binary32.FORMAT, {
    sign: Binary32.unpackGetSign(f),
    exponent: Binary32.unpackGetExponentUnbiased(f) + Binary32.BIAS,
    significand: BigInt(Binary32.unpackGetSignificand(f)),
  });
}

/**
 * Convert a half to a double.
 *
 * @param h Unsigned 16-bit pattern.
 * @returns The exact value.
 * @throws {RangeError} If h is not an integer in 0..0xffff.
 */
export function unpackDouble(h: number): number {
  return Binary64.fromBits(widen(Binary64.FORMAT, h));
}

/**
 * Convert a half to a single.  Every half is exactly representable as a
 * single, so this is the same value as unpackDouble.
 *
 * @param h Unsigned 16-bit pattern.
 * @returns The exact value.
 * @throws {RangeError} If h is not an integer in 0..0xffff.
 */
export function unpackFloat(h: number): number {
  return Binary32.fromBits(Number(widen(Binary32.FORMAT, h)));
}

/**
 * Return the half that has exactly the given value, if there is one.
 * Otherwise returns null.
 *
 * @param n The number to convert.  NaN always converts.
 * @returns Half on success, otherwise null.  Make sure to check with
 *   `=== null`, in case this returns 0, which is valid.
 */
export function packExact(n: number): number | null {
  const h = packDouble(n);
  if (Number.isNaN(n)) {
    return h;
  }
  return Object.is(unpackDouble(h), n) ? h : null;
}

/**
 * Will this number fit into a half without losing precision?
 *
 * @param n Number to check.
 * @returns True if this is an eligible f16.
 */
export function isHalf(n: number): boolean {
  return packExact(n) !== null;
}
