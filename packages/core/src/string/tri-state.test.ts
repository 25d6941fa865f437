import { describe, it, expect } from 'vitest';
import { combine, fromBoolean, keepIfTrue } from './tri-state.js';
import type { TriState } from './tri-state.js';

describe('combine()', () => {
  const cases: [TriState, TriState, TriState][] = [
    ['yes', 'yes', 'yes'],
    ['yes', 'unknown', 'unknown'],
    ['unknown', 'yes', 'unknown'],
    ['unknown', 'unknown', 'unknown'],
    ['no', 'unknown', 'no'],
    ['unknown', 'no', 'no'],
    ['yes', 'no', 'no'],
    ['no', 'no', 'no'],
  ];

  it.each(cases)('combine(%s, %s) is %s', (a, b, expected) => {
    expect(combine(a, b)).toBe(expected);
  });
});

describe('keepIfTrue() / fromBoolean()', () => {
  it('keeps only known-true facts', () => {
    expect(keepIfTrue('yes')).toBe('yes');
    expect(keepIfTrue('no')).toBe('unknown');
    expect(keepIfTrue('unknown')).toBe('unknown');
  });

  it('maps booleans to known states', () => {
    expect(fromBoolean(true)).toBe('yes');
    expect(fromBoolean(false)).toBe('no');
  });
});
