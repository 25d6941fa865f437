export { CiByteString } from './ci-byte-string.js';
export type { ByteStorage, ConversionResult, FactHints } from './ci-byte-string.js';
export { combine, fromBoolean, keepIfTrue } from './tri-state.js';
export type { TriState } from './tri-state.js';
export { WILDCARD, hasWildcard, wildcardMatch, wildcardEquals } from './wildcard.js';
export {
  bytesEqual,
  bytesCompare,
  caselessEquals,
  caselessCompare,
  indexOfByte,
  lastIndexOfByte,
  indexOfSequence,
  containsByteCaseless,
  containsCaseless,
} from './comparison.js';
