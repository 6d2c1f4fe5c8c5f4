import {
  MASK_SIGN,
  NAN,
  NEGATIVE_INFINITY,
  NEGATIVE_ZERO,
  POSITIVE_INFINITY,
  POSITIVE_ZERO,
  checkHalf,
  isInfinite,
  isNaN,
  isSubnormal,
  isZero,
  packFields,
  packSetExponentUnbiasedUnchecked,
  packSetSignUnchecked,
  packSetSignificandUnchecked,
  toHex,
  unpackGetExponentUnbiased,
  unpackGetSign,
  unpackGetSignificand,
} from '../src/binary16.ts';
import {assert, test} from 'vitest';

test('accessors', () => {
  assert.equal(unpackGetSign(0xc100), 1);
  assert.equal(unpackGetExponentUnbiased(0xc100), 1);
  assert.equal(unpackGetSignificand(0xc100), 0x100);

  assert.equal(unpackGetSign(POSITIVE_ZERO), 0);
  assert.equal(unpackGetSign(NEGATIVE_ZERO), 1);
  assert.equal(unpackGetExponentUnbiased(0x0001), -15);
  assert.equal(unpackGetExponentUnbiased(POSITIVE_INFINITY), 16);
  assert.equal(unpackGetSignificand(NAN), 0x200);
});

test('setters', () => {
  assert.equal(packSetSignUnchecked(1), MASK_SIGN);
  assert.equal(packSetSignUnchecked(2), 0);
  assert.equal(packSetExponentUnbiasedUnchecked(0), 0x3c00);
  assert.equal(packSetExponentUnbiasedUnchecked(16), 0x7c00);
  assert.equal(packSetExponentUnbiasedUnchecked(-15), 0);
  assert.equal(packSetExponentUnbiasedUnchecked(17), 0);
  assert.equal(packSetSignificandUnchecked(0x7ff), 0x3ff);
  assert.equal(
    packSetSignUnchecked(1) |
      packSetExponentUnbiasedUnchecked(1) |
      packSetSignificandUnchecked(0x100),
    0xc100
  );
});

test('packFields', () => {
  assert.equal(packFields(1, 1, 0x100), 0xc100);
  assert.equal(packFields(0, 0, 0), 0x3c00);
  assert.equal(packFields(1, 16, 0), NEGATIVE_INFINITY);
  assert.equal(packFields(0, -15, 1), 0x0001);
  assert.throws(() => packFields(2, 0, 0), RangeError);
  assert.throws(() => packFields(0, 17, 0), RangeError);
  assert.throws(() => packFields(0, -16, 0), RangeError);
  assert.throws(() => packFields(0, 0, 1024), RangeError);
  assert.throws(() => packFields(0, 0.5, 0), /Invalid exponent 0.5 for range -15..16/);
});

test('checkHalf', () => {
  checkHalf(0);
  checkHalf(0xffff);
  assert.throws(() => checkHalf(0x10000), RangeError);
  assert.throws(() => checkHalf(-1), /Invalid binary16 pattern -1 for range 0..65535/);
});

test('predicates', () => {
  assert(isNaN(NAN));
  assert(isNaN(0xfc01));
  assert(!isNaN(POSITIVE_INFINITY));
  assert(isInfinite(POSITIVE_INFINITY));
  assert(isInfinite(NEGATIVE_INFINITY));
  assert(!isInfinite(NAN));
  assert(!isInfinite(0x7bff));
  assert(isZero(POSITIVE_ZERO));
  assert(isZero(NEGATIVE_ZERO));
  assert(!isZero(0x0001));
  assert(isSubnormal(0x0001));
  assert(isSubnormal(0x83ff));
  assert(!isSubnormal(0x0400));
  assert(!isSubnormal(NEGATIVE_ZERO));
});

test('toHex', () => {
  assert.equal(toHex(0x3c00), '0x3c00');
  assert.equal(toHex(1), '0x0001');
  assert.equal(toHex(NEGATIVE_INFINITY), '0xfc00');
});
