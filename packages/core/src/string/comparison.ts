/**
 * Byte-range comparison and search over `(bytes, length)` pairs.
 *
 * Compare functions return the difference of the first unequal bytes, or
 * -1 / 1 when one side is a strict prefix of the other.
 */

import { asciiToLower, memCompare, memCompareCaseInsensitive } from '../memory/memory-utility.js';

export function bytesEqual(
  a: Uint8Array,
  aLength: number,
  b: Uint8Array,
  bLength: number,
): boolean {
  if (aLength !== bLength) return false;
  if (aLength === 0 || a === b) return true;
  return memCompare(a, 0, b, 0, aLength) === 0;
}

export function caselessEquals(
  a: Uint8Array,
  aLength: number,
  b: Uint8Array,
  bLength: number,
): boolean {
  if (aLength !== bLength) return false;
  if (aLength === 0 || a === b) return true;
  return memCompareCaseInsensitive(a, 0, b, 0, aLength) === 0;
}

function compareLengths(cmp: number, aLength: number, bLength: number): number {
  if (cmp !== 0) return cmp;
  if (aLength === bLength) return 0;
  return aLength < bLength ? -1 : 1;
}

export function bytesCompare(
  a: Uint8Array,
  aLength: number,
  b: Uint8Array,
  bLength: number,
): number {
  if (a === b && aLength === bLength) return 0;
  return compareLengths(memCompare(a, 0, b, 0, Math.min(aLength, bLength)), aLength, bLength);
}

export function caselessCompare(
  a: Uint8Array,
  aLength: number,
  b: Uint8Array,
  bLength: number,
): number {
  if (a === b && aLength === bLength) return 0;
  return compareLengths(
    memCompareCaseInsensitive(a, 0, b, 0, Math.min(aLength, bLength)),
    aLength,
    bLength,
  );
}

/** First index of `b` at or after `from`, or -1. */
export function indexOfByte(bytes: Uint8Array, length: number, b: number, from = 0): number {
  for (let i = Math.max(0, from); i < length; i++) {
    if (bytes[i] === b) return i;
  }
  return -1;
}

/** Last index of `b` at or after `to`, or -1. */
export function lastIndexOfByte(bytes: Uint8Array, length: number, b: number, to = 0): number {
  for (let i = length - 1; i >= Math.max(0, to); i--) {
    if (bytes[i] === b) return i;
  }
  return -1;
}

/** Exact substring search. */
export function indexOfSequence(
  haystack: Uint8Array,
  haystackLength: number,
  needle: Uint8Array,
  needleLength: number,
): number {
  if (needleLength === 0) return 0;
  const first = needle[0];
  const last = haystackLength - needleLength;
  for (let i = 0; i <= last; i++) {
    if (haystack[i] === first && memCompare(haystack, i + 1, needle, 1, needleLength - 1) === 0) {
      return i;
    }
  }
  return -1;
}

/** Single-byte caseless containment. A lowercase haystack needs no folding on its side. */
export function containsByteCaseless(
  haystack: Uint8Array,
  haystackLength: number,
  needle: number,
  haystackIsLower: boolean,
): boolean {
  const lowered = asciiToLower(needle);
  if (haystackIsLower) {
    return indexOfByte(haystack, haystackLength, lowered) >= 0;
  }
  for (let i = 0; i < haystackLength; i++) {
    if (asciiToLower(haystack[i]) === lowered) return true;
  }
  return false;
}

/** Sliding caseless search anchored on the lowered first needle byte. */
export function containsCaseless(
  haystack: Uint8Array,
  haystackLength: number,
  needle: Uint8Array,
  needleLength: number,
  haystackIsLower: boolean,
): boolean {
  const first = asciiToLower(needle[0]);
  const rest = needleLength - 1;
  const last = haystackLength - needleLength;
  for (let i = 0; i <= last; i++) {
    const candidate = haystackIsLower ? haystack[i] : asciiToLower(haystack[i]);
    if (candidate === first && memCompareCaseInsensitive(haystack, i + 1, needle, 1, rest) === 0) {
      return true;
    }
  }
  return false;
}
