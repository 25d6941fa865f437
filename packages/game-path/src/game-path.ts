/**
 * GamePath: a CiByteString that is known to fit the asset index.
 *
 * Every constructor checks the byte length against MAX_GAME_PATH_LENGTH and
 * reports failure through `ok` with GamePath.Empty as the value. Separator
 * direction is never validated; text input has backslashes turned into `/`.
 */

import { isAbsolute, relative, resolve } from 'node:path';
import { CiByteString, MetaData } from '@modpath/core';
import { EXTENSION_SEPARATOR, MAX_GAME_PATH_LENGTH, PATH_SEPARATOR } from './config.js';
import { GamePathError } from './errors.js';
import { computeLowerCaseDomainHash } from './path-hash.js';

export interface GamePathResult {
  ok: boolean;
  path: GamePath;
}

const BACKSLASH = 0x5c;
const DRIVE_SEPARATOR = 0x3a; // ':'

function isAsciiLetter(b: number): boolean {
  return (b >= 0x41 && b <= 0x5a) || (b >= 0x61 && b <= 0x7a);
}

export class GamePath {
  /** The canonical empty path. */
  static readonly Empty = new GamePath(CiByteString.Empty);

  private constructor(readonly path: CiByteString) {}

  private static checked(value: CiByteString): GamePathResult {
    if (value.length > MAX_GAME_PATH_LENGTH) {
      return { ok: false, path: GamePath.Empty };
    }
    return { ok: true, path: new GamePath(value) };
  }

  /** Borrow the zero-terminated path starting at `offset` in `buffer`. */
  static fromPointer(
    buffer: Uint8Array | null,
    offset = 0,
    flags: MetaData = MetaData.None,
  ): GamePathResult {
    return GamePath.checked(CiByteString.fromPointer(buffer, offset, flags));
  }

  static fromBytes(range: Uint8Array, flags: MetaData = MetaData.None): GamePathResult {
    return GamePath.checked(CiByteString.fromBytes(range, flags));
  }

  /**
   * Build an owned path from text. Backslashes become `/`, then leading
   * slashes are stripped and the rest is trimmed. Empty input is a valid
   * empty path.
   */
  static fromText(text: string | null | undefined): GamePathResult {
    if (!text) return { ok: true, path: GamePath.Empty };

    const normalized = text.replace(/\\/g, '/').replace(/^\/+/, '').trim();
    if (normalized.length === 0) return { ok: true, path: GamePath.Empty };
    // UTF-8 is never shorter than the UTF-16 length, so this rejects early.
    if (normalized.length > MAX_GAME_PATH_LENGTH) return { ok: false, path: GamePath.Empty };

    const { ok, value } = CiByteString.fromText(normalized);
    if (!ok) return { ok: false, path: GamePath.Empty };

    const result = GamePath.checked(value);
    if (!result.ok) value.dispose();
    return result;
  }

  /** Wrap an existing string. A missing string is a valid empty path. */
  static fromByteString(value: CiByteString | null | undefined): GamePathResult {
    if (!value) return { ok: true, path: GamePath.Empty };
    return GamePath.checked(value);
  }

  /** Path of `file` relative to `baseDir`. Files outside `baseDir` fail. */
  static fromFile(file: string, baseDir: string): GamePathResult {
    const rel = relative(resolve(baseDir), resolve(file));
    const outside =
      rel === '..' || rel.startsWith('../') || rel.startsWith('..\\') || isAbsolute(rel);
    if (rel.length === 0 || outside) {
      return { ok: false, path: GamePath.Empty };
    }
    return GamePath.fromText(rel);
  }

  /**
   * Read a path from a structured-data value, as written by {@link toJSON}.
   * Throws GamePathError on anything that is not a valid path string.
   */
  static parse(value: unknown): GamePath {
    if (typeof value !== 'string') {
      throw new GamePathError(String(value), 'expected a string');
    }
    const { ok, path } = GamePath.fromText(value);
    if (!ok) {
      throw new GamePathError(value, `longer than ${MAX_GAME_PATH_LENGTH} bytes or not encodable`);
    }
    return path;
  }

  /** Whether the path starts with a slash, a backslash, or a drive letter. */
  static isRooted(path: CiByteString | Uint8Array): boolean {
    const bytes = path instanceof CiByteString ? path.span : path;
    if (bytes.length >= 1 && (bytes[0] === PATH_SEPARATOR || bytes[0] === BACKSLASH)) return true;
    return bytes.length >= 2 && isAsciiLetter(bytes[0]) && bytes[1] === DRIVE_SEPARATOR;
  }

  get length(): number {
    return this.path.length;
  }

  get isEmpty(): boolean {
    return this.path.isEmpty;
  }

  /** Everything after the last `/`, or the whole path. Borrowed. */
  filename(): CiByteString {
    const idx = this.path.lastIndexOf(PATH_SEPARATOR);
    return idx === -1 ? this.path : this.path.substring(idx + 1);
  }

  /** Everything from the last `.`, or the empty string. Borrowed. */
  extension(): CiByteString {
    const idx = this.path.lastIndexOf(EXTENSION_SEPARATOR);
    return idx === -1 ? CiByteString.Empty : this.path.substring(idx);
  }

  isRooted(): boolean {
    return GamePath.isRooted(this.path);
  }

  /** Lowercase asset-index hash of the path. */
  pathHash(): bigint {
    return computeLowerCaseDomainHash(this.path);
  }

  clone(): GamePath {
    return new GamePath(this.path.clone());
  }

  equals(other: GamePath | null | undefined): boolean {
    return other !== null && other !== undefined && this.path.equals(other.path);
  }

  compareTo(other: GamePath | null | undefined): number {
    return this.path.compareTo(other?.path);
  }

  hashCode(): number {
    return this.path.hashCode();
  }

  toString(): string {
    return this.path.toString();
  }

  toJSON(): string {
    return this.path.toString();
  }

  dispose(): void {
    this.path.dispose();
  }
}
