/**
 * Raw byte primitives used by the string engine.
 *
 * None of these check bounds beyond what the typed array does itself: callers
 * pass counts that fit both operands.
 */

const ASCII_UPPER_A = 0x41;
const ASCII_UPPER_Z = 0x5a;
const ASCII_LOWER_A = 0x61;
const ASCII_LOWER_Z = 0x7a;
const ASCII_CASE_BIT = 0x20;

/** Bytes at or above this value are not ASCII. */
export const ASCII_LIMIT = 0x80;

export function asciiToLower(b: number): number {
  return b >= ASCII_UPPER_A && b <= ASCII_UPPER_Z ? b | ASCII_CASE_BIT : b;
}

export function asciiToUpper(b: number): number {
  return b >= ASCII_LOWER_A && b <= ASCII_LOWER_Z ? b & ~ASCII_CASE_BIT : b;
}

/** True when the byte is unchanged by ASCII lowercasing (non-letters and non-ASCII included). */
export function asciiIsLower(b: number): boolean {
  return b < ASCII_UPPER_A || b > ASCII_UPPER_Z;
}

/** Tab through carriage return, the 0x1C-0x1F separators, and space. */
export function isAsciiWhitespace(b: number): boolean {
  return b === 0x20 || (b >= 0x09 && b <= 0x0d) || (b >= 0x1c && b <= 0x1f);
}

export function memCopy(
  dst: Uint8Array,
  dstOffset: number,
  src: Uint8Array,
  srcOffset: number,
  count: number,
): void {
  if (count <= 0) return;
  dst.set(src.subarray(srcOffset, srcOffset + count), dstOffset);
}

export function memCompare(
  a: Uint8Array,
  aOffset: number,
  b: Uint8Array,
  bOffset: number,
  count: number,
): number {
  if (a === b && aOffset === bOffset) return 0;
  for (let i = 0; i < count; i++) {
    const diff = a[aOffset + i] - b[bOffset + i];
    if (diff !== 0) return diff;
  }
  return 0;
}

export function memCompareCaseInsensitive(
  a: Uint8Array,
  aOffset: number,
  b: Uint8Array,
  bOffset: number,
  count: number,
): number {
  for (let i = 0; i < count; i++) {
    const diff = asciiToLower(a[aOffset + i]) - asciiToLower(b[bOffset + i]);
    if (diff !== 0) return diff;
  }
  return 0;
}

export function memFill(dst: Uint8Array, offset: number, value: number, count: number): void {
  if (count <= 0) return;
  dst.fill(value, offset, offset + count);
}

export function asciiToLowerInPlace(bytes: Uint8Array, length: number): void {
  for (let i = 0; i < length; i++) {
    bytes[i] = asciiToLower(bytes[i]);
  }
}

/** Copy `length` bytes of `src` into `dst`, lowercasing ASCII letters on the way. */
export function asciiToLowerCopy(dst: Uint8Array, src: Uint8Array, length: number): void {
  for (let i = 0; i < length; i++) {
    dst[i] = asciiToLower(src[i]);
  }
}

/**
 * Replace every `from` byte with `to` in the first `length` bytes.
 * Returns the number of bytes replaced.
 */
export function replaceBytes(bytes: Uint8Array, length: number, from: number, to: number): number {
  let replaced = 0;
  for (let i = 0; i < length; i++) {
    if (bytes[i] === from) {
      bytes[i] = to;
      replaced++;
    }
  }
  return replaced;
}
