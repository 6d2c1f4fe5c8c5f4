/**
 * Shape of one IEEE 754 binary interchange format.
 */
export interface FloatFormat {
  /** IEEE 754 name, e.g. "binary16". */
  readonly name: string;

  /** Width of the stored exponent field. */
  readonly exponentBits: number;

  /** Width of the stored significand, not counting the implicit bit. */
  readonly significandBits: number;

  /** `2 ** (exponentBits - 1) - 1` */
  readonly bias: number;
}

/**
 * A float split into its three fields.  Only ever lives for the duration
 * of a single conversion.
 */
export interface UnpackedFloat {
  sign: 0 | 1;

  /** Stored (biased) exponent field. */
  exponent: number;

  /** Stored significand field, without the implicit leading bit. */
  significand: bigint;
}

/**
 * Largest value of the exponent field: infinities and NaN.
 *
 * @param fmt Format.
 * @returns All-ones exponent.
 */
export function maxExponent(fmt: FloatFormat): number {
  return (2 ** fmt.exponentBits) - 1;
}

/**
 * Assemble a bit pattern from its fields.  Fields are assumed to be in
 * range already.
 *
 * @param fmt Target format.
 * @param f Fields.
 * @returns Pattern, unsigned.
 */
export function assemble(fmt: FloatFormat, f: UnpackedFloat): bigint {
  const m = BigInt(fmt.significandBits);
  const e = BigInt(fmt.exponentBits);
  return (BigInt(f.sign) << (e + m)) |
    (BigInt(f.exponent) << m) |
    f.significand;
}
