/**
 * Case-insensitive glob matching with `*` as the only wildcard.
 */

import { asciiToLower } from '../memory/memory-utility.js';
import { caselessEquals } from './comparison.js';

export const WILDCARD = 0x2a; // '*'

export function hasWildcard(bytes: Uint8Array, length: number): boolean {
  for (let i = 0; i < length; i++) {
    if (bytes[i] === WILDCARD) return true;
  }
  return false;
}

/**
 * Greedy matcher with single-star backtracking. On a mismatch the pattern
 * cursor returns to just past the last `*` and that star absorbs one more
 * text byte.
 */
export function wildcardMatch(
  pattern: Uint8Array,
  patternLength: number,
  text: Uint8Array,
  textLength: number,
): boolean {
  let p = 0;
  let t = 0;
  let star = -1;
  let resume = 0;

  while (t < textLength) {
    if (p < patternLength && pattern[p] === WILDCARD) {
      star = p;
      resume = t;
      p++;
    } else if (p < patternLength && asciiToLower(pattern[p]) === asciiToLower(text[t])) {
      p++;
      t++;
    } else if (star >= 0) {
      p = star + 1;
      resume++;
      t = resume;
    } else {
      return false;
    }
  }

  while (p < patternLength && pattern[p] === WILDCARD) {
    p++;
  }
  return p === patternLength;
}

/**
 * Equality where a side containing `*` acts as a pattern for the other side.
 * Plain caseless equality is accepted first, so two identical patterns match.
 */
export function wildcardEquals(
  a: Uint8Array,
  aLength: number,
  b: Uint8Array,
  bLength: number,
): boolean {
  if (caselessEquals(a, aLength, b, bLength)) return true;
  if (hasWildcard(a, aLength)) return wildcardMatch(a, aLength, b, bLength);
  if (hasWildcard(b, bLength)) return wildcardMatch(b, bLength, a, aLength);
  return false;
}
