import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { MetaData } from '../crc/scanner.js';
import { CiByteString } from './ci-byte-string.js';
import { wildcardMatch } from './wildcard.js';

const encode = (text: string): Uint8Array => new TextEncoder().encode(text);

function owned(text: string, flags: MetaData = MetaData.CiCrc32): CiByteString {
  return CiByteString.fromText(text, flags).value;
}

/** Borrowed string with no facts computed, so no hash filter applies. */
function plain(text: string): CiByteString {
  return CiByteString.fromBytes(encode(text));
}

describe('equals()', () => {
  it('ignores ASCII case', () => {
    expect(plain('Chara/Human').equals(plain('chara/HUMAN'))).toBe(true);
    expect(owned('Chara/Human').equals(owned('chara/HUMAN'))).toBe(true);
    expect(plain('chara/human').equals(plain('chara/humans'))).toBe(false);
  });

  it('short-circuits on identity and rejects null', () => {
    const s = plain('abc');
    expect(s.equals(s)).toBe(true);
    expect(s.equals(null)).toBe(false);
    expect(s.equals(undefined)).toBe(false);
  });

  it('compares raw bytes when both sides are known lowercase', () => {
    const a = owned('chara/human', MetaData.AsciiLowerCase);
    const b = plain('chara/human');
    expect(b.isAsciiLowerCase).toBe(true);
    expect(a.equals(b)).toBe(true);
  });

  it('rejects on differing cached hashes', () => {
    expect(owned('abc').equals(owned('abd'))).toBe(false);
  });

  it('does not fold non-ASCII bytes', () => {
    expect(plain('É').equals(plain('é'))).toBe(false);
  });

  it('matches a wildcard side against the other side', () => {
    expect(plain('a*c').equals(plain('abc'))).toBe(true);
    expect(plain('ABC').equals(plain('a*c'))).toBe(true);
    expect(plain('chara/*/c0101.mdl').equals(plain('Chara/Human/C0101.MDL'))).toBe(true);
    expect(plain('a*c').equals(plain('xyz'))).toBe(false);
    expect(plain('a*c').equals(plain('A*C'))).toBe(true);
  });

  it('lets a cached-hash mismatch reject before wildcard matching', () => {
    expect(owned('a*c').equals(owned('abc'))).toBe(false);
  });

  it('is an equivalence relation for non-wildcard strings (property)', () => {
    const letters = fc.constantFrom(...'aAbBcC/._'.split(''));
    const word = fc.array(letters, { maxLength: 8 }).map((chars) => chars.join(''));
    fc.assert(
      fc.property(word, word, word, (x, y, z) => {
        const [a, b, c] = [plain(x), plain(y), plain(z)];
        expect(a.equals(a)).toBe(true);
        expect(a.equals(b)).toBe(b.equals(a));
        if (a.equals(b) && b.equals(c)) {
          expect(a.equals(c)).toBe(true);
        }
        expect(a.equals(b)).toBe(x.toLowerCase() === y.toLowerCase());
      }),
    );
  });
});

describe('equalsCs()', () => {
  it('respects case', () => {
    expect(plain('abc').equalsCs(plain('abc'))).toBe(true);
    expect(plain('abc').equalsCs(plain('ABC'))).toBe(false);
  });
});

describe('compareTo()', () => {
  it('orders ignoring ASCII case', () => {
    expect(plain('Apple').compareTo(plain('apple'))).toBe(0);
    expect(plain('apple').compareTo(plain('BANANA'))).toBeLessThan(0);
    expect(plain('banana').compareTo(plain('APPLE'))).toBeGreaterThan(0);
  });

  it('sorts a prefix first', () => {
    expect(plain('chara').compareTo(plain('chara/human'))).toBe(-1);
    expect(plain('chara/human').compareTo(plain('CHARA'))).toBe(1);
  });

  it('treats null as smaller', () => {
    expect(plain('a').compareTo(null)).toBe(1);
  });

  it('gives no special meaning to wildcards', () => {
    expect(plain('a*c').compareTo(plain('abc'))).toBe(0x2a - 0x62);
  });

  it('sorts case-insensitively through Array.sort', () => {
    const sorted = ['b', 'C', 'a'].map(plain).sort((x, y) => x.compareTo(y)).map(String);
    expect(sorted).toEqual(['a', 'b', 'C']);
  });
});

describe('compareToCs()', () => {
  it('orders by raw bytes', () => {
    expect(plain('B').compareToCs(plain('a'))).toBe(0x42 - 0x61);
    expect(plain('a').compareToCs(plain('a'))).toBe(0);
  });
});

describe('startsWith / endsWith', () => {
  const path = plain('Chara/Human/c0101.MDL');

  it('checks prefixes and suffixes ignoring case', () => {
    expect(path.startsWith(plain('chara/'))).toBe(true);
    expect(path.endsWith(plain('.mdl'))).toBe(true);
    expect(path.startsWith(encode('CHARA'))).toBe(true);
    expect(path.endsWith(encode('.tex'))).toBe(false);
    expect(plain('a').startsWith(plain('ab'))).toBe(false);
  });

  it('has case-sensitive variants', () => {
    expect(path.startsWithCs(encode('Chara'))).toBe(true);
    expect(path.startsWithCs(encode('chara'))).toBe(false);
    expect(path.endsWithCs(plain('.MDL'))).toBe(true);
    expect(path.endsWithCs(plain('.mdl'))).toBe(false);
  });
});

describe('indexOf / lastIndexOf', () => {
  const s = plain('a/b/c');

  it('finds single bytes', () => {
    expect(s.indexOf(0x2f)).toBe(1);
    expect(s.indexOf(0x2f, 2)).toBe(3);
    expect(s.lastIndexOf(0x2f)).toBe(3);
    expect(s.lastIndexOf(0x2f, 4)).toBe(-1);
    expect(s.indexOf(0x7a)).toBe(-1);
  });
});

describe('contains()', () => {
  it('handles trivial needles', () => {
    expect(plain('abc').contains(CiByteString.Empty)).toBe(true);
    expect(plain('ab').contains(plain('abc'))).toBe(false);
  });

  it('finds single-byte needles ignoring case', () => {
    expect(plain('Chara').contains(encode('R'))).toBe(true);
    expect(plain('Chara').contains(encode('x'))).toBe(false);
    expect(owned('chara', MetaData.AsciiLowerCase).contains(encode('C'))).toBe(true);
  });

  it('uses a direct search when both sides are lowercase', () => {
    const hay = owned('chara/human/c0101', MetaData.AsciiLowerCase);
    expect(hay.contains(owned('human', MetaData.AsciiLowerCase))).toBe(true);
    expect(hay.contains(owned('humans', MetaData.AsciiLowerCase))).toBe(false);
  });

  it('finds mixed-case needles anywhere, including at the very end', () => {
    const hay = plain('Chara/Human/C0101');
    expect(hay.contains(plain('HUMAN'))).toBe(true);
    expect(hay.contains(encode('c0101'))).toBe(true);
    expect(hay.contains(plain('chara/human/c0101'))).toBe(true);
    expect(hay.contains(plain('human/c0102'))).toBe(false);
  });

  it('has a case-sensitive variant', () => {
    expect(plain('Chara').containsCs(encode('har'))).toBe(true);
    expect(plain('Chara').containsCs(encode('HAR'))).toBe(false);
  });
});

describe('wildcardMatch()', () => {
  const match = (pattern: string, text: string): boolean => {
    const p = encode(pattern);
    const t = encode(text);
    return wildcardMatch(p, p.length, t, t.length);
  };

  it('matches empty and star-only patterns', () => {
    expect(match('', '')).toBe(true);
    expect(match('*', '')).toBe(true);
    expect(match('**', 'anything')).toBe(true);
    expect(match('', 'a')).toBe(false);
  });

  it('backtracks to the last star', () => {
    expect(match('*.mdl', 'a.mdl.mdl')).toBe(true);
    expect(match('a*b*c', 'aXbYbZc')).toBe(true);
    expect(match('a*b', 'aXbY')).toBe(false);
    expect(match('*x*', 'abc')).toBe(false);
  });

  it('folds ASCII case', () => {
    expect(match('CHARA/*', 'chara/human')).toBe(true);
  });
});
