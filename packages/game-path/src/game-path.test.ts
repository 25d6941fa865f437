import { describe, it, expect } from 'vitest';
import { join, resolve } from 'node:path';
import { CiByteString } from '@modpath/core';
import { MAX_GAME_PATH_LENGTH } from './config.js';
import { GamePathError } from './errors.js';
import { GamePath } from './game-path.js';

const encode = (text: string): Uint8Array => new TextEncoder().encode(text);

function pathOf(text: string): GamePath {
  const { ok, path } = GamePath.fromText(text);
  expect(ok).toBe(true);
  return path;
}

describe('GamePath', () => {
  describe('length limit', () => {
    it('is 2048 bytes', () => {
      expect(MAX_GAME_PATH_LENGTH).toBe(2048);
    });

    it('accepts a path of exactly the limit', () => {
      const { ok, path } = GamePath.fromText('a'.repeat(MAX_GAME_PATH_LENGTH));
      expect(ok).toBe(true);
      expect(path.length).toBe(MAX_GAME_PATH_LENGTH);
    });

    it('rejects one byte more and hands back the empty path', () => {
      const text = GamePath.fromText('a'.repeat(MAX_GAME_PATH_LENGTH + 1));
      expect(text.ok).toBe(false);
      expect(text.path).toBe(GamePath.Empty);

      const bytes = GamePath.fromBytes(new Uint8Array(MAX_GAME_PATH_LENGTH + 1).fill(0x61));
      expect(bytes.ok).toBe(false);
      expect(bytes.path).toBe(GamePath.Empty);
    });

    it('counts UTF-8 bytes, not characters', () => {
      const { ok } = GamePath.fromText('é'.repeat(MAX_GAME_PATH_LENGTH / 2 + 1));
      expect(ok).toBe(false);
    });

    it('checks wrapped strings too', () => {
      const long = CiByteString.fromBytes(new Uint8Array(MAX_GAME_PATH_LENGTH + 1).fill(0x62));
      expect(GamePath.fromByteString(long).ok).toBe(false);
      expect(GamePath.fromByteString(CiByteString.fromBytes(encode('ok/path'))).ok).toBe(true);
    });
  });

  describe('construction', () => {
    it('normalizes text input', () => {
      expect(pathOf('\\Chara\\Human\\c0101.mdl ').toString()).toBe('Chara/Human/c0101.mdl');
      expect(pathOf('//chara/human.mdl').toString()).toBe('chara/human.mdl');
    });

    it('trims whitespace left behind by stripped leading slashes', () => {
      const slashed = pathOf('/ chara/a.mdl');
      expect(slashed.toString()).toBe('chara/a.mdl');
      expect(slashed.equals(pathOf('chara/a.mdl'))).toBe(true);
      expect(slashed.pathHash()).toBe(pathOf('chara/a.mdl').pathHash());
      expect(pathOf('\\ chara').toString()).toBe('chara');
    });

    it('keeps a slash that follows leading whitespace', () => {
      expect(pathOf('  /chara').toString()).toBe('/chara');
    });

    it('treats missing and blank input as the empty path', () => {
      expect(GamePath.fromText(null)).toEqual({ ok: true, path: GamePath.Empty });
      expect(GamePath.fromText('   ')).toEqual({ ok: true, path: GamePath.Empty });
      expect(GamePath.fromByteString(undefined)).toEqual({ ok: true, path: GamePath.Empty });
      expect(GamePath.fromPointer(null).path.isEmpty).toBe(true);
    });

    it('fails on text that cannot be encoded', () => {
      expect(GamePath.fromText('bad\uDC00path')).toEqual({ ok: false, path: GamePath.Empty });
    });

    it('borrows up to the terminator from a buffer', () => {
      const buffer = encode('xxchara/a.mdl\0junk');
      const { ok, path } = GamePath.fromPointer(buffer, 2);
      expect(ok).toBe(true);
      expect(path.toString()).toBe('chara/a.mdl');
      expect(path.path.isOwned).toBe(false);
    });
  });

  describe('fromFile', () => {
    const base = resolve('/game/data');

    it('gives the path relative to the base directory', () => {
      const { ok, path } = GamePath.fromFile(join(base, 'chara', 'human', 'c0101.mdl'), base);
      expect(ok).toBe(true);
      expect(path.toString()).toBe('chara/human/c0101.mdl');
    });

    it('rejects files outside the base directory', () => {
      expect(GamePath.fromFile(resolve('/game/other/c0101.mdl'), base)).toEqual({
        ok: false,
        path: GamePath.Empty,
      });
      expect(GamePath.fromFile(base, base).ok).toBe(false);
    });
  });

  describe('parse', () => {
    it('reads what toJSON writes', () => {
      const original = pathOf('chara/human/c0101.mdl');
      const json = JSON.stringify({ file: original });
      expect(json).toBe('{"file":"chara/human/c0101.mdl"}');

      const parsed: unknown = JSON.parse(json);
      const file =
        typeof parsed === 'object' && parsed !== null && 'file' in parsed ? parsed.file : undefined;
      expect(GamePath.parse(file).equals(original)).toBe(true);
    });

    it('throws GamePathError on non-strings', () => {
      expect(() => GamePath.parse(42)).toThrow(GamePathError);
      expect(() => GamePath.parse(42)).toThrow(
        'Could not convert "42" to a game path: expected a string',
      );
    });

    it('throws GamePathError on paths over the limit', () => {
      expect(() => GamePath.parse('a'.repeat(MAX_GAME_PATH_LENGTH + 1))).toThrow(GamePathError);
    });
  });

  describe('parts', () => {
    const path = pathOf('chara/human/c0101.mdl');

    it('borrows the filename', () => {
      const filename = path.filename();
      expect(filename.toString()).toBe('c0101.mdl');
      expect(filename.isOwned).toBe(false);
      expect(filename.span.buffer).toBe(path.path.span.buffer);
    });

    it('borrows the extension', () => {
      expect(path.extension().toString()).toBe('.mdl');
      expect(pathOf('chara/human').extension()).toBe(CiByteString.Empty);
    });

    it('uses the whole path as filename without a separator', () => {
      const bare = pathOf('c0101.mdl');
      expect(bare.filename()).toBe(bare.path);
    });
  });

  describe('isRooted', () => {
    it('detects slashes and drive letters', () => {
      expect(GamePath.isRooted(encode('/chara'))).toBe(true);
      expect(GamePath.isRooted(encode('\\chara'))).toBe(true);
      expect(GamePath.isRooted(encode('c:'))).toBe(true);
      expect(GamePath.isRooted(encode('chara/c:'))).toBe(false);
      expect(GamePath.isRooted(encode('1:'))).toBe(false);
      expect(GamePath.isRooted(new Uint8Array(0))).toBe(false);
    });

    it('works on instances', () => {
      expect(pathOf('D:/Games').isRooted()).toBe(true);
      expect(pathOf('/chara').isRooted()).toBe(false);
    });
  });

  describe('identity', () => {
    it('compares ignoring ASCII case', () => {
      const a = pathOf('Chara/Human.mdl');
      const b = pathOf('chara/HUMAN.MDL');
      expect(a.equals(b)).toBe(true);
      expect(a.compareTo(b)).toBe(0);
      expect(a.hashCode()).toBe(b.hashCode());
      expect(a.equals(null)).toBe(false);
    });

    it('hashes like the asset index', () => {
      expect(pathOf('Foo/BAR').pathHash()).toBe(0x738c9ade89007355n);
      expect(GamePath.Empty.pathHash()).toBe(0n);
    });

    it('clones into an owned copy', () => {
      const borrowed = GamePath.fromBytes(encode('chara/a.mdl')).path;
      const copy = borrowed.clone();
      expect(copy.path.isOwned).toBe(true);
      expect(copy.equals(borrowed)).toBe(true);
      copy.dispose();
      expect(copy.isEmpty).toBe(true);
    });
  });
});
