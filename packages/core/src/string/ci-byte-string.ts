/**
 * CiByteString: a byte string that ignores ASCII case for hashing and comparison.
 *
 * A string either borrows a window of someone else's `Uint8Array` (a view) or
 * owns a buffer it allocated itself. Owned buffers are always `length + 1`
 * bytes long and end in a zero byte. Views share memory with their source and
 * are only valid for as long as the caller keeps that source unchanged.
 *
 * Derived facts (both CRC32 flavours, "pure ASCII", "ASCII lowercase") are
 * computed on first read and then kept. Operations that produce a new string
 * carry over whatever facts still hold for the result.
 */

import {
  computeCiCrc32,
  computeCrc32,
  computeIsAscii,
  computeIsAsciiLower,
  MetaData,
  scanMetadata,
} from '../crc/scanner.js';
import type { ScanResult } from '../crc/scanner.js';
import { ByteIndexOutOfRangeError } from '../errors.js';
import {
  ASCII_LIMIT,
  asciiIsLower,
  asciiToLowerCopy,
  asciiToLowerInPlace,
  asciiToUpper,
  isAsciiWhitespace,
  memCopy,
  replaceBytes,
} from '../memory/memory-utility.js';
import {
  allocateString,
  freeString,
  trackOwnedBuffer,
  untrackOwnedBuffer,
} from '../memory/string-memory.js';
import {
  bytesCompare,
  bytesEqual,
  caselessCompare,
  caselessEquals,
  containsByteCaseless,
  containsCaseless,
  indexOfByte,
  indexOfSequence,
  lastIndexOfByte,
} from './comparison.js';
import { combine, fromBoolean, keepIfTrue } from './tri-state.js';
import type { TriState } from './tri-state.js';
import { hasWildcard, wildcardEquals } from './wildcard.js';

/**
 * Where the bytes live. `bytes` always starts at the first content byte; a
 * view's array may run past the content into the rest of the source buffer.
 */
export type ByteStorage =
  | { readonly kind: 'view'; readonly bytes: Uint8Array }
  | { readonly kind: 'owned'; readonly bytes: Uint8Array };

/** Outcome of a fallible conversion: `value` is the canonical empty string when `ok` is false. */
export interface ConversionResult<T> {
  ok: boolean;
  value: T;
}

export interface FactHints {
  isLower?: boolean;
  isAscii?: boolean;
}

type StringFacts = Omit<StringInit, 'storage' | 'length' | 'terminated'>;

interface StringInit {
  storage: ByteStorage;
  length: number;
  terminated: boolean;
  ciCrc32?: number | null;
  crc32?: number | null;
  isAsciiLower?: TriState;
  isAscii?: TriState;
}

/** Shared terminator every empty string points at. */
const NULL_TERMINATOR = new Uint8Array(1);
const EMPTY_STORAGE: ByteStorage = { kind: 'view', bytes: NULL_TERMINATOR };
const EMPTY_CRC32 = 0;

const UNPAIRED_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8');
const asciiDecoder = new TextDecoder('ascii');

function hintToTriState(hint: boolean | undefined): TriState {
  return hint === undefined ? 'unknown' : fromBoolean(hint);
}

export class CiByteString implements Iterable<number> {
  /** The canonical zero-length, terminated string. */
  static readonly Empty: CiByteString = new CiByteString({
    storage: EMPTY_STORAGE,
    length: 0,
    terminated: true,
    ciCrc32: EMPTY_CRC32,
    crc32: EMPTY_CRC32,
    isAsciiLower: 'yes',
    isAscii: 'yes',
  });

  private storage: ByteStorage;
  private byteLength: number;
  private terminated: boolean;
  private ciCrc: number | null;
  private crc: number | null;
  private asciiLower: TriState;
  private ascii: TriState;

  private constructor(init: StringInit) {
    this.storage = init.storage;
    this.byteLength = init.length;
    this.terminated = init.terminated;
    this.ciCrc = init.ciCrc32 ?? null;
    this.crc = init.crc32 ?? null;
    this.asciiLower = init.isAsciiLower ?? 'unknown';
    this.ascii = init.isAscii ?? 'unknown';
    if (init.storage.kind === 'owned') {
      trackOwnedBuffer(this, init.storage.bytes.length);
    }
  }

  // ---------------------------------------------------------------------------
  // Construction
  // ---------------------------------------------------------------------------

  private static fromScan(bytes: Uint8Array, scan: ScanResult): CiByteString {
    return new CiByteString({
      storage: { kind: 'view', bytes },
      length: scan.length,
      terminated: scan.terminated,
      ciCrc32: scan.ciCrc32,
      crc32: scan.crc32,
      isAsciiLower: scan.isAsciiLower,
      isAscii: scan.isAscii,
    });
  }

  private static owned(bytes: Uint8Array, length: number, facts: StringFacts = {}): CiByteString {
    return new CiByteString({
      ...facts,
      storage: { kind: 'owned', bytes },
      length,
      terminated: true,
    });
  }

  /** Allocate an owned, terminated copy of `length` bytes of `source`. */
  private static copyOf(source: Uint8Array, length: number): Uint8Array {
    const bytes = allocateString(length + 1);
    memCopy(bytes, 0, source, 0, length);
    return bytes;
  }

  /**
   * Borrow the zero-terminated string starting at `offset` in `buffer`.
   * The scan stops at the first zero byte or after `maxLength` bytes and
   * gathers the facts named in `flags` on the way. A missing buffer or a
   * negative offset gives the empty string.
   */
  static fromPointer(
    buffer: Uint8Array | null | undefined,
    offset = 0,
    flags: MetaData = MetaData.None,
    maxLength = Number.MAX_SAFE_INTEGER,
  ): CiByteString {
    if (!buffer || offset < 0) return CiByteString.Empty;
    const bytes = buffer.subarray(offset);
    return CiByteString.fromScan(bytes, scanMetadata(bytes, 0, flags, maxLength));
  }

  /** Borrow a byte range, reading up to its first zero byte. */
  static fromBytes(range: Uint8Array, flags: MetaData = MetaData.None): CiByteString {
    if (range.length === 0) return CiByteString.Empty;
    return CiByteString.fromPointer(range, 0, flags, range.length);
  }

  /**
   * Encode text as UTF-8 into an owned string, optionally lowercasing ASCII
   * first. Text with an unpaired surrogate cannot be encoded and fails.
   */
  static fromText(
    text: string | null | undefined,
    flags: MetaData = MetaData.CiCrc32,
    toAsciiLower = false,
  ): ConversionResult<CiByteString> {
    if (!text) return { ok: true, value: CiByteString.Empty };
    if (UNPAIRED_SURROGATE.test(text)) return { ok: false, value: CiByteString.Empty };

    const encoded = utf8Encoder.encode(text);
    const length = encoded.length;
    const bytes = CiByteString.copyOf(encoded, length);
    const isAscii = fromBoolean(length === text.length);

    let scanFlags = flags & ~MetaData.Ascii;
    if (toAsciiLower) {
      asciiToLowerInPlace(bytes, length);
      scanFlags &= ~MetaData.AsciiLowerCase;
    }

    const scan = scanMetadata(bytes, 0, scanFlags, length);
    // An embedded NUL ends the scan early; its facts then cover only a prefix.
    const complete = scan.length === length;
    const value = CiByteString.owned(bytes, length, {
      ciCrc32: complete ? scan.ciCrc32 : null,
      crc32: complete ? scan.crc32 : null,
      isAsciiLower: toAsciiLower ? 'yes' : complete ? scan.isAsciiLower : 'unknown',
      isAscii,
    });
    return { ok: true, value };
  }

  /**
   * Borrow `length` bytes without scanning. The caller vouches for
   * `terminated` and for any hints; wrong hints give wrong answers later.
   */
  static fromBytesUnsafe(
    bytes: Uint8Array,
    length: number,
    terminated: boolean,
    hints: FactHints = {},
  ): CiByteString {
    return new CiByteString({
      storage: { kind: 'view', bytes },
      length,
      terminated,
      isAsciiLower: hintToTriState(hints.isLower),
      isAscii: hintToTriState(hints.isAscii),
    });
  }

  // ---------------------------------------------------------------------------
  // Access
  // ---------------------------------------------------------------------------

  get length(): number {
    return this.byteLength;
  }

  get isEmpty(): boolean {
    return this.byteLength === 0;
  }

  get isOwned(): boolean {
    return this.storage.kind === 'owned';
  }

  get isTerminated(): boolean {
    return this.terminated;
  }

  /** The content bytes, sharing memory with the underlying buffer. */
  get span(): Uint8Array {
    return this.storage.bytes.subarray(0, this.byteLength);
  }

  /** Case-insensitive CRC32, computed once. */
  get ciCrc32(): number {
    if (this.ciCrc === null) {
      this.ciCrc = computeCiCrc32(this.storage.bytes, this.byteLength);
    }
    return this.ciCrc;
  }

  /** Case-sensitive CRC32, computed once. */
  get crc32(): number {
    if (this.crc === null) {
      this.crc = computeCrc32(this.storage.bytes, this.byteLength);
    }
    return this.crc;
  }

  get isAscii(): boolean {
    if (this.ascii === 'unknown') {
      this.ascii = fromBoolean(computeIsAscii(this.storage.bytes, this.byteLength));
    }
    return this.ascii === 'yes';
  }

  /** True when no byte changes under ASCII lowercasing. */
  get isAsciiLowerCase(): boolean {
    if (this.asciiLower === 'unknown') {
      this.asciiLower = fromBoolean(computeIsAsciiLower(this.storage.bytes, this.byteLength));
    }
    return this.asciiLower === 'yes';
  }

  /** The ASCII fact as currently known, without computing it. */
  get knownAscii(): TriState {
    return this.ascii;
  }

  /** The lowercase fact as currently known, without computing it. */
  get knownAsciiLower(): TriState {
    return this.asciiLower;
  }

  get hasCiCrc32(): boolean {
    return this.ciCrc !== null;
  }

  get hasCrc32(): boolean {
    return this.crc !== null;
  }

  at(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.byteLength) {
      throw new ByteIndexOutOfRangeError(index, this.byteLength);
    }
    return this.storage.bytes[index];
  }

  *[Symbol.iterator](): Iterator<number> {
    for (let i = 0; i < this.byteLength; i++) {
      yield this.storage.bytes[i];
    }
  }

  hashCode(): number {
    return this.ciCrc32;
  }

  toString(): string {
    if (this.byteLength === 0) return '';
    const decoder = this.ascii === 'yes' ? asciiDecoder : utf8Decoder;
    return decoder.decode(this.span);
  }

  toJSON(): string {
    return this.toString();
  }

  // ---------------------------------------------------------------------------
  // Comparison and search
  // ---------------------------------------------------------------------------

  private bothKnownLower(other: CiByteString): boolean {
    return this.asciiLower === 'yes' && other.asciiLower === 'yes';
  }

  /**
   * Case-insensitive equality. Cached hashes on both sides reject early; a `*`
   * on either side turns that side into a glob pattern for the other.
   */
  equals(other: CiByteString | null | undefined): boolean {
    if (!other) return false;
    if (other === this) return true;
    if (this.ciCrc !== null && other.ciCrc !== null && this.ciCrc !== other.ciCrc) return false;

    const a = this.storage.bytes;
    const b = other.storage.bytes;
    if (this.bothKnownLower(other)) {
      return bytesEqual(a, this.byteLength, b, other.byteLength);
    }
    if (hasWildcard(a, this.byteLength) || hasWildcard(b, other.byteLength)) {
      return wildcardEquals(a, this.byteLength, b, other.byteLength);
    }
    return caselessEquals(a, this.byteLength, b, other.byteLength);
  }

  equalsCs(other: CiByteString | null | undefined): boolean {
    if (!other) return false;
    if (other === this) return true;
    return bytesEqual(this.storage.bytes, this.byteLength, other.storage.bytes, other.byteLength);
  }

  /** Case-insensitive ordering. `*` has no special meaning here. */
  compareTo(other: CiByteString | null | undefined): number {
    if (other === this) return 0;
    if (!other) return 1;
    const compare = this.bothKnownLower(other) ? bytesCompare : caselessCompare;
    return compare(this.storage.bytes, this.byteLength, other.storage.bytes, other.byteLength);
  }

  compareToCs(other: CiByteString | null | undefined): number {
    if (other === this) return 0;
    if (!other) return 1;
    return bytesCompare(this.storage.bytes, this.byteLength, other.storage.bytes, other.byteLength);
  }

  startsWith(prefix: CiByteString | Uint8Array): boolean {
    const [bytes, length] = CiByteString.operand(prefix);
    if (length > this.byteLength) return false;
    const compare =
      prefix instanceof CiByteString && this.bothKnownLower(prefix) ? bytesEqual : caselessEquals;
    return compare(this.storage.bytes, length, bytes, length);
  }

  endsWith(suffix: CiByteString | Uint8Array): boolean {
    const [bytes, length] = CiByteString.operand(suffix);
    const offset = this.byteLength - length;
    if (offset < 0) return false;
    const compare =
      suffix instanceof CiByteString && this.bothKnownLower(suffix) ? bytesEqual : caselessEquals;
    return compare(this.storage.bytes.subarray(offset), length, bytes, length);
  }

  startsWithCs(prefix: CiByteString | Uint8Array): boolean {
    const [bytes, length] = CiByteString.operand(prefix);
    return length <= this.byteLength && bytesEqual(this.storage.bytes, length, bytes, length);
  }

  endsWithCs(suffix: CiByteString | Uint8Array): boolean {
    const [bytes, length] = CiByteString.operand(suffix);
    const offset = this.byteLength - length;
    return offset >= 0 && bytesEqual(this.storage.bytes.subarray(offset), length, bytes, length);
  }

  /** Case-insensitive substring test. */
  contains(needle: CiByteString | Uint8Array): boolean {
    const [bytes, length] = CiByteString.operand(needle);
    if (length > this.byteLength) return false;
    if (length === 0) return true;

    const hay = this.storage.bytes;
    const hayIsLower = this.asciiLower === 'yes';
    if (length === 1) {
      return containsByteCaseless(hay, this.byteLength, bytes[0], hayIsLower);
    }
    if (hayIsLower && needle instanceof CiByteString && needle.asciiLower === 'yes') {
      return indexOfSequence(hay, this.byteLength, bytes, length) >= 0;
    }
    return containsCaseless(hay, this.byteLength, bytes, length, hayIsLower);
  }

  containsCs(needle: CiByteString | Uint8Array): boolean {
    const [bytes, length] = CiByteString.operand(needle);
    if (length > this.byteLength) return false;
    return indexOfSequence(this.storage.bytes, this.byteLength, bytes, length) >= 0;
  }

  indexOf(b: number, from = 0): number {
    return indexOfByte(this.storage.bytes, this.byteLength, b, from);
  }

  lastIndexOf(b: number, to = 0): number {
    return lastIndexOfByte(this.storage.bytes, this.byteLength, b, to);
  }

  private static operand(value: CiByteString | Uint8Array): [Uint8Array, number] {
    return value instanceof CiByteString
      ? [value.storage.bytes, value.byteLength]
      : [value, value.length];
  }

  // ---------------------------------------------------------------------------
  // Derived strings
  // ---------------------------------------------------------------------------

  /** Owned copy with every known fact carried over. */
  clone(): CiByteString {
    if (this.byteLength === 0) return CiByteString.Empty;
    const bytes = CiByteString.copyOf(this.storage.bytes, this.byteLength);
    return CiByteString.owned(bytes, this.byteLength, {
      ciCrc32: this.ciCrc,
      crc32: this.crc,
      isAsciiLower: this.asciiLower,
      isAscii: this.ascii,
    });
  }

  private view(
    start: number,
    length: number,
    terminated: boolean,
    isAsciiLower: TriState,
    isAscii: TriState,
  ): CiByteString {
    return new CiByteString({
      storage: { kind: 'view', bytes: this.storage.bytes.subarray(start) },
      length,
      terminated,
      isAsciiLower,
      isAscii,
    });
  }

  /** Borrowed tail from `from`. Out-of-range starts give the empty string. */
  substring(from: number): CiByteString;
  /** Borrowed window; a window reaching past the end is the tail from `from`. */
  substring(from: number, length: number): CiByteString;
  substring(from: number, length?: number): CiByteString {
    if (length === undefined) {
      if (from === 0) return this;
      if (from < 0 || from >= this.byteLength) return CiByteString.Empty;
      return this.view(
        from,
        this.byteLength - from,
        this.terminated,
        keepIfTrue(this.asciiLower),
        keepIfTrue(this.ascii),
      );
    }

    if (from === 0 && length === this.byteLength) return this;
    const available = this.byteLength - from;
    if (from < 0 || available <= 0 || length <= 0) return CiByteString.Empty;
    if (length >= available) return this.substring(from);
    return this.view(from, length, false, keepIfTrue(this.asciiLower), keepIfTrue(this.ascii));
  }

  /** Drop leading ASCII whitespace. */
  trimFront(): CiByteString {
    if (this.byteLength === 0) return CiByteString.Empty;
    const bytes = this.storage.bytes;
    let start = 0;
    while (start < this.byteLength && isAsciiWhitespace(bytes[start])) start++;
    if (start === 0) return this;
    if (start === this.byteLength) return CiByteString.Empty;
    return this.view(start, this.byteLength - start, this.terminated, this.asciiLower, this.ascii);
  }

  /** Drop trailing ASCII whitespace. */
  trimEnd(): CiByteString {
    if (this.byteLength === 0) return CiByteString.Empty;
    const bytes = this.storage.bytes;
    let end = this.byteLength;
    while (end > 0 && isAsciiWhitespace(bytes[end - 1])) end--;
    if (end === this.byteLength) return this;
    if (end === 0) return CiByteString.Empty;
    return this.view(0, end, false, this.asciiLower, this.ascii);
  }

  trim(): CiByteString {
    return this.trimFront().trimEnd();
  }

  private loweredCopy(): CiByteString {
    const bytes = allocateString(this.byteLength + 1);
    asciiToLowerCopy(bytes, this.storage.bytes, this.byteLength);
    return CiByteString.owned(bytes, this.byteLength, { isAsciiLower: 'yes', isAscii: this.ascii });
  }

  /** Lowercase ASCII letters; returns `this` when already known to be lowercase. */
  toLowerAscii(): CiByteString {
    return this.asciiLower === 'yes' ? this : this.loweredCopy();
  }

  /** Lowercase ASCII letters into a new owned buffer. */
  toLowerAsciiClone(): CiByteString {
    return this.loweredCopy();
  }

  /** Owned copy with the first ASCII letter of every whitespace-separated word upper-cased. */
  toMixedCaseAscii(): CiByteString {
    if (this.byteLength === 0) return CiByteString.Empty;
    const bytes = CiByteString.copyOf(this.storage.bytes, this.byteLength);
    let previousWhitespace = true;
    for (let i = 0; i < this.byteLength; i++) {
      if (previousWhitespace) bytes[i] = asciiToUpper(bytes[i]);
      previousWhitespace = isAsciiWhitespace(bytes[i]);
    }
    return CiByteString.owned(bytes, this.byteLength, {
      isAsciiLower: this.asciiLower === 'no' ? 'no' : 'unknown',
      isAscii: this.ascii,
    });
  }

  /** Owned copy with every `from` byte replaced by `to`. */
  replace(from: number, to: number): CiByteString {
    const bytes = CiByteString.copyOf(this.storage.bytes, this.byteLength);
    const replaced = replaceBytes(bytes, this.byteLength, from, to);
    if (replaced === 0) {
      return CiByteString.owned(bytes, this.byteLength, {
        isAsciiLower: this.asciiLower,
        isAscii: this.ascii,
      });
    }
    return CiByteString.owned(bytes, this.byteLength, {
      isAsciiLower: asciiIsLower(to) ? keepIfTrue(this.asciiLower) : 'no',
      isAscii: to < ASCII_LIMIT ? keepIfTrue(this.ascii) : 'no',
    });
  }

  /**
   * Split on `separator` into borrowed pieces. After `maxSplits - 1` cuts the
   * remainder is returned whole. Empty pieces are dropped (and not counted)
   * when `removeEmpty` is set.
   */
  split(
    separator: number,
    maxSplits = Number.POSITIVE_INFINITY,
    removeEmpty = true,
  ): CiByteString[] {
    const pieces: CiByteString[] = [];
    let start = 0;
    for (
      let idx = this.indexOf(separator);
      idx >= 0 && pieces.length < maxSplits - 1;
      idx = this.indexOf(separator, start)
    ) {
      if (start !== idx || !removeEmpty) {
        pieces.push(this.substring(start, idx - start));
      }
      start = idx + 1;
    }
    if (start < this.byteLength || !removeEmpty) {
      pieces.push(this.substring(start));
    }
    return pieces;
  }

  /** Concatenate `strings` with `separator` between neighbours into an owned string. */
  static join(separator: number, strings: readonly CiByteString[]): CiByteString {
    if (strings.length === 0) return CiByteString.Empty;
    const withSeparator = strings.length > 1;
    return CiByteString.concatenate(
      strings,
      withSeparator ? separator : null,
      withSeparator ? fromBoolean(asciiIsLower(separator)) : 'yes',
      withSeparator ? fromBoolean(separator < ASCII_LIMIT) : 'yes',
    );
  }

  /** Concatenate `strings` into an owned string. */
  static concat(...strings: CiByteString[]): CiByteString {
    if (strings.length === 0) return CiByteString.Empty;
    return CiByteString.concatenate(strings, null, 'yes', 'yes');
  }

  private static concatenate(
    strings: readonly CiByteString[],
    separator: number | null,
    isAsciiLower: TriState,
    isAscii: TriState,
  ): CiByteString {
    const separatorBytes = separator === null ? 0 : strings.length - 1;
    const length = strings.reduce((sum, s) => sum + s.byteLength, 0) + separatorBytes;
    const bytes = allocateString(length + 1);

    let cursor = 0;
    let lower = isAsciiLower;
    let ascii = isAscii;
    strings.forEach((s, i) => {
      if (separator !== null && i > 0) {
        bytes[cursor++] = separator;
      }
      memCopy(bytes, cursor, s.storage.bytes, 0, s.byteLength);
      cursor += s.byteLength;
      lower = combine(lower, s.asciiLower);
      ascii = combine(ascii, s.ascii);
    });

    return CiByteString.owned(bytes, length, { isAsciiLower: lower, isAscii: ascii });
  }

  // ---------------------------------------------------------------------------
  // Disposal
  // ---------------------------------------------------------------------------

  /**
   * Give up an owned buffer and turn this instance into the empty string.
   * Safe to call any number of times.
   */
  dispose(): void {
    if (this.storage.kind === 'owned') {
      untrackOwnedBuffer(this);
      freeString(this.storage.bytes);
    }
    this.storage = EMPTY_STORAGE;
    this.byteLength = 0;
    this.terminated = true;
    this.ciCrc = EMPTY_CRC32;
    this.crc = EMPTY_CRC32;
    this.asciiLower = 'yes';
    this.ascii = 'yes';
  }
}

