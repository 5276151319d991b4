import { describe, it, expect } from 'vitest';

import {
  attributeNames,
  countNamesShorterThan,
  isReservedIdentifier,
  takeNames,
} from '../attribute-names';

describe('attributeNames', () => {
  it('starts with the single letters', () => {
    expect(takeNames(3)).toEqual(['a', 'b', 'c']);
    expect(takeNames(26).at(-1)).toBe('z');
  });

  it('continues with two-letter names', () => {
    expect(takeNames(28).slice(26)).toEqual(['aa', 'ab']);
  });

  it('skips reserved words', () => {
    // 'aa' is name 26, so 'ar' is name 43 and 'as' would be 44
    expect(takeNames(45).slice(43)).toEqual(['ar', 'at']);
  });

  it('yields distinct, non-reserved names', () => {
    const names = takeNames(2000);
    expect(new Set(names).size).toBe(2000);
    expect(names.some(isReservedIdentifier)).toBe(false);
    expect(names.every((name) => /^[a-z]+$/.test(name))).toBe(true);
  });

  it('restarts for every call', () => {
    const first = attributeNames();
    const second = attributeNames();
    first.next();
    first.next();
    expect(second.next().value).toBe('a');
    expect(first.next().value).toBe('c');
  });

  it('returns no names for a zero or negative count', () => {
    expect(takeNames(0)).toEqual([]);
    expect(takeNames(-1)).toEqual([]);
  });
});

describe('countNamesShorterThan', () => {
  it('counts the names that precede the given length', () => {
    expect(countNamesShorterThan(1)).toBe(0);
    expect(countNamesShorterThan(2)).toBe(26);
    // 26 + 676 minus as, do, if, in, is, of
    expect(countNamesShorterThan(3)).toBe(696);
  });

  it('agrees with the sequence', () => {
    const names = takeNames(697);
    expect(names[695]).toBe('zz');
    expect(names[696]).toBe('aaa');
  });
});

describe('isReservedIdentifier', () => {
  it('flags keywords and __proto__', () => {
    expect(isReservedIdentifier('class')).toBe(true);
    expect(isReservedIdentifier('of')).toBe(true);
    expect(isReservedIdentifier('__proto__')).toBe(true);
    expect(isReservedIdentifier('a')).toBe(false);
    expect(isReservedIdentifier('inherited')).toBe(false);
  });
});
