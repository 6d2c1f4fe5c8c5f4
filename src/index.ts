export * as Binary16 from './binary16.ts';
export * as Binary32 from './binary32.ts';
export * as Binary64 from './binary64.ts';
export {FORMAT as BINARY16} from './binary16.ts';
export {FORMAT as BINARY32} from './binary32.ts';
export {FORMAT as BINARY64} from './binary64.ts';
export type {FloatFormat, UnpackedFloat} from './format.ts';
export {
  isHalf,
  packDouble,
  packDouble as pack,
  packExact,
  packFloat,
  unpackDouble,
  unpackDouble as unpack,
  unpackFloat,
} from './half.ts';
export {
  type HalfOptions,
  type RequiredHalfOptions,
  defaultHalfOptions,
  readHalf,
  writeHalf,
} from './bytes.ts';
export {
  TruncationError,
} from './errors.ts';
