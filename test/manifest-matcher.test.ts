/**
 * Manifest Pattern Matching Tests
 */

import { describe, it, expect } from 'vitest';
import {
  compareCodePoints,
  compileAnchored,
  matchesAtStart,
  matchPatterns,
} from '../src/manifest/matcher.js';

describe('matchesAtStart', () => {
  it('should match a prefix of the entry', () => {
    expect(matchesAtStart(compileAnchored('lib'), 'libfoo.so')).toBe(true);
  });

  it('should not match in the middle of the entry', () => {
    expect(matchesAtStart(compileAnchored('foo'), 'libfoo.so')).toBe(false);
  });

  it('should give the same answer when the regex is reused', () => {
    const regex = compileAnchored('a');
    expect(matchesAtStart(regex, 'abc')).toBe(true);
    expect(matchesAtStart(regex, 'abc')).toBe(true);
    expect(matchesAtStart(regex, 'bca')).toBe(false);
  });
});

describe('matchPatterns', () => {
  it('should succeed when every pattern finds an entry', () => {
    const result = matchPatterns(['^lib.*\\.so$'], ['libfoo.so', 'main']);

    expect(result.missing).toEqual([]);
    expect(result.matches).toEqual([{ pattern: '^lib.*\\.so$', entry: 'libfoo.so' }]);
  });

  it('should report a pattern without a matching entry', () => {
    const result = matchPatterns(['^missing\\.txt$'], ['a.txt', 'b.txt']);

    expect(result.missing).toEqual(['^missing\\.txt$']);
    expect(result.matches).toEqual([]);
  });

  it('should report the first matching entry in listing order', () => {
    const result = matchPatterns(['b'], ['a', 'b2', 'b1']);
    expect(result.matches).toEqual([{ pattern: 'b', entry: 'b2' }]);
  });

  it('should sort missing patterns whatever the declaration order', () => {
    const listing = ['present'];

    const forward = matchPatterns(['zeta', 'alpha', 'mid', 'present'], listing);
    const backward = matchPatterns(['present', 'mid', 'alpha', 'zeta'], listing);

    expect(forward.missing).toEqual(['alpha', 'mid', 'zeta']);
    expect(backward.missing).toEqual(forward.missing);
  });

  it('should sort astral characters after the rest of the BMP', () => {
    const result = matchPatterns(['\u{1F600}', '\uFFFD', 'a'], []);
    expect(result.missing).toEqual(['a', '\uFFFD', '\u{1F600}']);
  });

  it('should report nothing for an empty pattern list', () => {
    expect(matchPatterns([], ['a'])).toEqual({ matches: [], missing: [] });
  });
});

describe('compareCodePoints', () => {
  it('should order by code point and put prefixes first', () => {
    expect(compareCodePoints('abc', 'abd')).toBe(-1);
    expect(compareCodePoints('ab', 'abc')).toBe(-1);
    expect(compareCodePoints('\u{1F600}', '\uFFFD')).toBe(1);
    expect(compareCodePoints('same', 'same')).toBe(0);
  });
});
