import type { ContentListing } from '../types/index.js';

export interface PatternMatch {
  pattern: string;
  entry: string;
}

export interface MatchResult {
  matches: PatternMatch[];
  missing: string[];
}

/**
 * Compile a pattern that only matches at the start of an entry.
 * The sticky flag anchors at `lastIndex`, which is reset before each test.
 */
export function compileAnchored(pattern: string): RegExp {
  return new RegExp(pattern, 'y');
}

/**
 * True when the pattern matches a prefix of the entry (not necessarily all of it).
 */
export function matchesAtStart(regex: RegExp, entry: string): boolean {
  regex.lastIndex = 0;
  return regex.test(entry);
}

/**
 * Order strings by Unicode code point. Plain `sort()` compares UTF-16 code
 * units, which puts astral characters before U+E000..U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const left = a.codePointAt(i) ?? 0;
    const right = b.codePointAt(j) ?? 0;
    if (left !== right) return left < right ? -1 : 1;
    i += left > 0xffff ? 2 : 1;
    j += right > 0xffff ? 2 : 1;
  }
  const restA = a.length - i;
  const restB = b.length - j;
  return restA === restB ? 0 : restA < restB ? -1 : 1;
}

/**
 * Check every pattern against a listing. Patterns are processed in code point
 * order, so `missing` is sorted whatever the declaration order.
 */
export function matchPatterns(patterns: readonly string[], listing: ContentListing): MatchResult {
  const matches: PatternMatch[] = [];
  const missing: string[] = [];

  for (const pattern of [...patterns].sort(compareCodePoints)) {
    const regex = compileAnchored(pattern);
    const entry = listing.find((name) => matchesAtStart(regex, name));

    if (entry === undefined) {
      missing.push(pattern);
    } else {
      matches.push({ pattern, entry });
    }
  }

  return { matches, missing };
}
