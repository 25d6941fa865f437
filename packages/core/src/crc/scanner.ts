/**
 * Single-pass metadata scanner.
 *
 * Every scanner walks forward from `start`, stops at the first zero byte, at
 * `start + maxLength`, or at the end of the array, whichever comes first, and
 * gathers all of its facts in that one walk. {@link scanMetadata} picks the
 * narrowest scanner that covers the requested facts.
 */

import { ASCII_LIMIT, asciiToLower } from '../memory/memory-utility.js';
import { fromBoolean } from '../string/tri-state.js';
import type { TriState } from '../string/tri-state.js';
import { CRC32_SEED, crc32Finish, crc32Step } from './crc-table.js';

/** Which facts to gather while scanning. Values combine as bit flags. */
export enum MetaData {
  None = 0x00,
  /** Case-insensitive CRC32, the general-purpose hash. */
  CiCrc32 = 0x01,
  /** Case-sensitive CRC32. */
  Crc32 = 0x02,
  /** Whether every byte is unchanged by ASCII lowercasing. */
  AsciiLowerCase = 0x04,
  /** Whether every byte is below 0x80. */
  Ascii = 0x08,
  All = CiCrc32 | Crc32 | AsciiLowerCase | Ascii,
}

export interface ScanResult {
  /** Bytes before the terminator or the bound. */
  length: number;
  /** A zero byte was found within the bound. */
  terminated: boolean;
  ciCrc32: number | null;
  crc32: number | null;
  isAsciiLower: TriState;
  isAscii: TriState;
}

function scanEnd(bytes: Uint8Array, start: number, maxLength: number): number {
  return Math.min(bytes.length, start + Math.max(0, maxLength));
}

function result(
  start: number,
  cursor: number,
  terminated: boolean,
  facts: Partial<Omit<ScanResult, 'length' | 'terminated'>> = {},
): ScanResult {
  return {
    length: cursor - start,
    terminated,
    ciCrc32: facts.ciCrc32 ?? null,
    crc32: facts.crc32 ?? null,
    isAsciiLower: facts.isAsciiLower ?? 'unknown',
    isAscii: facts.isAscii ?? 'unknown',
  };
}

export function scanSize(
  bytes: Uint8Array,
  start = 0,
  maxLength = Number.MAX_SAFE_INTEGER,
): ScanResult {
  const end = scanEnd(bytes, start, maxLength);
  let cursor = start;
  while (cursor < end) {
    if (bytes[cursor] === 0) return result(start, cursor, true);
    cursor++;
  }
  return result(start, cursor, false);
}

export function scanCiCrc32(
  bytes: Uint8Array,
  start = 0,
  maxLength = Number.MAX_SAFE_INTEGER,
): ScanResult {
  const end = scanEnd(bytes, start, maxLength);
  let ciCrc = CRC32_SEED;
  let cursor = start;
  let terminated = false;
  for (; cursor < end; cursor++) {
    const value = bytes[cursor];
    if (value === 0) {
      terminated = true;
      break;
    }
    ciCrc = crc32Step(ciCrc, asciiToLower(value));
  }
  return result(start, cursor, terminated, { ciCrc32: crc32Finish(ciCrc) });
}

export function scanCrc32(
  bytes: Uint8Array,
  start = 0,
  maxLength = Number.MAX_SAFE_INTEGER,
): ScanResult {
  const end = scanEnd(bytes, start, maxLength);
  let crc = CRC32_SEED;
  let cursor = start;
  let terminated = false;
  for (; cursor < end; cursor++) {
    const value = bytes[cursor];
    if (value === 0) {
      terminated = true;
      break;
    }
    crc = crc32Step(crc, value);
  }
  return result(start, cursor, terminated, { crc32: crc32Finish(crc) });
}

export function scanCiCrc32AsciiLower(
  bytes: Uint8Array,
  start = 0,
  maxLength = Number.MAX_SAFE_INTEGER,
): ScanResult {
  const end = scanEnd(bytes, start, maxLength);
  let ciCrc = CRC32_SEED;
  let isLower = true;
  let isAscii = true;
  let cursor = start;
  let terminated = false;
  for (; cursor < end; cursor++) {
    const value = bytes[cursor];
    if (value === 0) {
      terminated = true;
      break;
    }
    const lower = asciiToLower(value);
    if (lower !== value) isLower = false;
    if (value >= ASCII_LIMIT) isAscii = false;
    ciCrc = crc32Step(ciCrc, lower);
  }
  return result(start, cursor, terminated, {
    ciCrc32: crc32Finish(ciCrc),
    isAsciiLower: fromBoolean(isLower),
    isAscii: fromBoolean(isAscii),
  });
}

export function scanCrc32AsciiLower(
  bytes: Uint8Array,
  start = 0,
  maxLength = Number.MAX_SAFE_INTEGER,
): ScanResult {
  const end = scanEnd(bytes, start, maxLength);
  let crc = CRC32_SEED;
  let isLower = true;
  let isAscii = true;
  let cursor = start;
  let terminated = false;
  for (; cursor < end; cursor++) {
    const value = bytes[cursor];
    if (value === 0) {
      terminated = true;
      break;
    }
    if (asciiToLower(value) !== value) isLower = false;
    if (value >= ASCII_LIMIT) isAscii = false;
    crc = crc32Step(crc, value);
  }
  return result(start, cursor, terminated, {
    crc32: crc32Finish(crc),
    isAsciiLower: fromBoolean(isLower),
    isAscii: fromBoolean(isAscii),
  });
}

export function scanAll(
  bytes: Uint8Array,
  start = 0,
  maxLength = Number.MAX_SAFE_INTEGER,
): ScanResult {
  const end = scanEnd(bytes, start, maxLength);
  let ciCrc = CRC32_SEED;
  let crc = CRC32_SEED;
  let isLower = true;
  let isAscii = true;
  let cursor = start;
  let terminated = false;
  for (; cursor < end; cursor++) {
    const value = bytes[cursor];
    if (value === 0) {
      terminated = true;
      break;
    }
    const lower = asciiToLower(value);
    if (lower !== value) isLower = false;
    if (value >= ASCII_LIMIT) isAscii = false;
    ciCrc = crc32Step(ciCrc, lower);
    crc = crc32Step(crc, value);
  }
  return result(start, cursor, terminated, {
    ciCrc32: crc32Finish(ciCrc),
    crc32: crc32Finish(crc),
    isAsciiLower: fromBoolean(isLower),
    isAscii: fromBoolean(isAscii),
  });
}

type Scanner = (bytes: Uint8Array, start: number, maxLength: number) => ScanResult;

function selectScanner(flags: MetaData): Scanner {
  const wantsCi = (flags & MetaData.CiCrc32) !== 0;
  const wantsCs = (flags & MetaData.Crc32) !== 0;
  const wantsCaseFacts = (flags & (MetaData.AsciiLowerCase | MetaData.Ascii)) !== 0;

  if (wantsCi && wantsCs) return scanAll;
  if (wantsCs) return wantsCaseFacts ? scanCrc32AsciiLower : scanCrc32;
  if (wantsCaseFacts) return scanCiCrc32AsciiLower;
  if (wantsCi) return scanCiCrc32;
  return scanSize;
}

/** Run the one scanner that covers `flags`. Facts outside `flags` may still come back known. */
export function scanMetadata(
  bytes: Uint8Array,
  start = 0,
  flags: MetaData = MetaData.None,
  maxLength = Number.MAX_SAFE_INTEGER,
): ScanResult {
  return selectScanner(flags)(bytes, start, maxLength);
}

// Single-purpose scanners over an exact range, used by the lazy accessors.

export function computeCrc32(bytes: Uint8Array, length: number): number {
  let crc = CRC32_SEED;
  for (let i = 0; i < length; i++) {
    crc = crc32Step(crc, bytes[i]);
  }
  return crc32Finish(crc);
}

export function computeCiCrc32(bytes: Uint8Array, length: number): number {
  let crc = CRC32_SEED;
  for (let i = 0; i < length; i++) {
    crc = crc32Step(crc, asciiToLower(bytes[i]));
  }
  return crc32Finish(crc);
}

export function computeIsAscii(bytes: Uint8Array, length: number): boolean {
  for (let i = 0; i < length; i++) {
    if (bytes[i] >= ASCII_LIMIT) return false;
  }
  return true;
}

export function computeIsAsciiLower(bytes: Uint8Array, length: number): boolean {
  for (let i = 0; i < length; i++) {
    const value = bytes[i];
    if (asciiToLower(value) !== value) return false;
  }
  return true;
}
