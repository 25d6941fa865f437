/**
 * 64-bit path hash used by the asset index.
 *
 * A path is split at its last `/`. The folder part's CRC32 fills the high
 * 32 bits and the file part's CRC32 the low 32 bits; a path without a
 * separator only fills the low half. The index stores its CRC32 values
 * without the final inversion, so {@link hash32} leaves it out as well.
 */

import { CRC32_SEED, CiByteString, asciiToLower, crc32Step } from '@modpath/core';
import { PATH_SEPARATOR } from './config.js';

function bytesOf(value: CiByteString | Uint8Array): Uint8Array {
  return value instanceof CiByteString ? value.span : value;
}

/** Asset-index CRC32 of `bytes[start, end)`. */
export function hash32(bytes: Uint8Array, start = 0, end = bytes.length): number {
  let crc = CRC32_SEED;
  for (let i = start; i < end; i++) {
    crc = crc32Step(crc, bytes[i]);
  }
  return crc;
}

function combineHalves(folder: number, file: number): bigint {
  return (BigInt(folder) << 32n) | BigInt(file);
}

/** Path hash of the bytes as given. */
export function computeDomainHash(path: CiByteString | Uint8Array): bigint {
  const bytes = bytesOf(path);
  if (bytes.length === 0) return 0n;

  const lastSeparator = bytes.lastIndexOf(PATH_SEPARATOR);
  if (lastSeparator === -1) return BigInt(hash32(bytes));

  return combineHalves(hash32(bytes, 0, lastSeparator), hash32(bytes, lastSeparator + 1));
}

/**
 * Path hash of the ASCII-lowercased bytes, in one pass and without building
 * the folder and file substrings. The running hash covers everything seen so
 * far; at every separator it becomes the folder candidate and the file hash
 * starts over.
 */
export function computeLowerCaseDomainHash(path: CiByteString | Uint8Array): bigint {
  const bytes = bytesOf(path);
  if (bytes.length === 0) return 0n;

  let folder = 0;
  let file = CRC32_SEED;
  let running = CRC32_SEED;
  for (const value of bytes) {
    if (value === PATH_SEPARATOR) {
      folder = running;
      file = CRC32_SEED;
      running = crc32Step(running, value);
    } else {
      const lower = asciiToLower(value);
      file = crc32Step(file, lower);
      running = crc32Step(running, lower);
    }
  }
  return combineHalves(folder, file);
}

/** Path hash of UTF-8 text, lowercased. Text that cannot be encoded hashes to 0. */
export function computeDomainHashFromText(text: string): bigint {
  const { ok, value } = CiByteString.fromText(text);
  if (!ok) return 0n;
  try {
    return computeLowerCaseDomainHash(value);
  } finally {
    value.dispose();
  }
}
