/**
 * Tests for sequence similarity and close matching
 */

import { describe, it, expect } from 'vitest';
import { SequenceMatcher, getCloseMatches } from '../src/resolver/sequence-matcher.js';

describe('SequenceMatcher', () => {
  it('should score a transposition', () => {
    expect(new SequenceMatcher('CreateFile', 'CretaeFile').ratio()).toBeCloseTo(0.9, 10);
  });

  it('should score prefixes by their length', () => {
    expect(new SequenceMatcher('ReadFile', 'ReadFil').ratio()).toBeCloseTo(14 / 15, 10);
    expect(new SequenceMatcher('ReadFileEx', 'ReadFil').ratio()).toBeCloseTo(14 / 17, 10);
  });

  it('should treat two empty strings as identical', () => {
    expect(new SequenceMatcher('', '').ratio()).toBe(1);
  });

  it('should list matching blocks in order', () => {
    const matcher = new SequenceMatcher('abxcd', 'abcd');
    expect(matcher.getMatchingBlocks()).toEqual([
      { a: 0, b: 0, size: 2 },
      { a: 3, b: 2, size: 2 },
    ]);
    expect(matcher.ratio()).toBeCloseTo(8 / 9, 10);
  });

  it('should prefer the earliest longest block', () => {
    const matcher = new SequenceMatcher(' abcd', 'abcd abcd');
    expect(matcher.findLongestMatch(0, 5, 0, 9)).toEqual({ a: 0, b: 4, size: 5 });
  });

  it('should bound the ratio from above', () => {
    const matcher = new SequenceMatcher('abcd', 'ab');
    expect(matcher.realQuickRatio()).toBeCloseTo(2 / 3, 10);
    expect(matcher.quickRatio()).toBeCloseTo(2 / 3, 10);
    expect(matcher.ratio()).toBeCloseTo(2 / 3, 10);
  });

  it('should compare by code point', () => {
    expect(new SequenceMatcher('文字', '文字').ratio()).toBe(1);
    expect(new SequenceMatcher('😀a', '😀b').ratio()).toBe(0.5);
  });

  it('should ignore popular characters of long strings', () => {
    const long = 'a'.repeat(10) + 'xyz'.repeat(70);
    expect(new SequenceMatcher('xyzaaaaa', long).ratio()).toBe(0);
  });

  it('should reuse the index of b across setA calls', () => {
    const matcher = new SequenceMatcher('ReadFile', 'ReadFil');
    expect(matcher.ratio()).toBeCloseTo(14 / 15, 10);
    matcher.setA('ReadFileEx');
    expect(matcher.ratio()).toBeCloseTo(14 / 17, 10);
  });
});

describe('getCloseMatches', () => {
  it('should return the best matches first', () => {
    expect(getCloseMatches('appel', ['ape', 'apple', 'peach', 'puppy'])).toEqual(['apple', 'ape']);
  });

  it('should order equal scores by candidate, descending', () => {
    expect(getCloseMatches('Foo', ['FooA', 'FooB'])).toEqual(['FooB', 'FooA']);
    expect(getCloseMatches('Foo', ['FooA', 'FooB', 'FooC', 'FooD'], { limit: 2 })).toEqual([
      'FooD',
      'FooC',
    ]);
  });

  it('should drop candidates below the cutoff', () => {
    expect(getCloseMatches('ReadFil', ['ReadFile', 'ReadFileEx', 'WriteFile'], { cutoff: 0.9 })).toEqual([
      'ReadFile',
    ]);
    expect(getCloseMatches('Zzzqqq', ['CreateFile', 'CloseHandle'])).toEqual([]);
  });

  it('should accept any iterable', () => {
    expect(getCloseMatches('CretaeFile', new Set(['CreateFile', 'CloseHandle']))).toEqual([
      'CreateFile',
    ]);
  });

  it('should reject invalid limits and cutoffs', () => {
    expect(() => getCloseMatches('a', ['a'], { limit: 0 })).toThrow(RangeError);
    expect(() => getCloseMatches('a', ['a'], { cutoff: 1.5 })).toThrow(RangeError);
    expect(() => getCloseMatches('a', ['a'], { cutoff: -0.1 })).toThrow(RangeError);
  });
});
