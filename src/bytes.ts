import {TruncationError} from './errors.ts';
import {intRange} from './binary16.ts';
import {packDouble, packExact, unpackDouble} from './half.ts';

export interface HalfOptions {
  /** Byte offset of the half. */
  offset?: number;

  /** Little-endian order, which is OPPOSITE from Network Byte Order. */
  littleEndian?: boolean;

  /**
   * If true, throw instead of rounding numbers that are not exactly
   * representable as a half.
   */
  exact?: boolean;
}

export type RequiredHalfOptions = Required<HalfOptions>;

export const defaultHalfOptions: RequiredHalfOptions = {
  offset: 0,
  littleEndian: false,
  exact: false,
};

/**
 * View two bytes of the array, checking bounds first.
 *
 * @param bytes Array.
 * @param offset Start.
 * @returns View over the whole array.
 * @throws {TruncationError} Fewer than two bytes left.
 */
function view(bytes: Uint8Array, offset: number): DataView {
  intRange(offset, 0, Number.MAX_SAFE_INTEGER, 'offset');
  if (offset + 2 > bytes.length) {
    throw new TruncationError(offset, 2, bytes.length);
  }
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Parse a half from a byte array.
 *
 * @param bytes Bytes to read from.
 * @param offset Offset into bytes to start reading 2 octets.
 * @param littleEndian Bytes swapped?
 * @returns Parsed number.
 * @throws {TruncationError} Fewer than two bytes left.
 */
export function readHalf(
  bytes: Uint8Array,
  offset = 0,
  littleEndian = false
): number {
  return unpackDouble(view(bytes, offset).getUint16(offset, littleEndian));
}

/**
 * Write a number into a byte array as a half.
 *
 * @param bytes Bytes to write into.
 * @param n Number to write.
 * @param opts Options.
 * @returns Offset just past the written half.
 * @throws {TruncationError} Fewer than two bytes left.
 * @throws {RangeError} Exact mode, and n would lose precision.
 */
export function writeHalf(
  bytes: Uint8Array,
  n: number,
  opts: HalfOptions = {}
): number {
  const {offset, littleEndian, exact} = {
    ...defaultHalfOptions,
    ...opts,
  };
  const dv = view(bytes, offset);
  const h = exact ? packExact(n) : packDouble(n);
  if (h === null) {
    throw new RangeError('Casting this number to float16 would lose precision');
  }
  dv.setUint16(offset, h, littleEndian);
  return offset + 2;
}
