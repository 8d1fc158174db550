/**
 * Wildcard matching for test filters.
 *
 * A pattern is matched against the whole candidate. `*` stands for zero or
 * more characters and may appear any number of times; every other character
 * matches itself.
 */

import type { Candidate, FilterExpression } from './types';

export const WILDCARD = '*';
export const PATTERN_DELIMITER = ':';

/**
 * True if `pattern` matches all of `candidate`.
 *
 * Iterative: on a mismatch the last wildcard seen absorbs one more candidate
 * character and matching resumes after it. Cost is bounded by the product of
 * both lengths and stack use is constant.
 */
export function match(pattern: string, candidate: string): boolean {
  let p = 0;
  let c = 0;
  let star = -1;
  let resume = 0;

  while (c < candidate.length) {
    if (p < pattern.length && pattern[p] === WILDCARD) {
      star = p++;
      resume = c;
    } else if (p < pattern.length && pattern[p] === candidate[c]) {
      p++;
      c++;
    } else if (star >= 0) {
      p = star + 1;
      c = ++resume;
    } else {
      return false;
    }
  }

  while (p < pattern.length && pattern[p] === WILDCARD) p++;
  return p === pattern.length;
}

/** Splits a `:`-delimited pattern list, dropping empty entries. */
export function splitPatterns(patterns: string): string[] {
  return patterns.split(PATTERN_DELIMITER).filter((p) => p.length > 0);
}

/**
 * True if at least one non-empty pattern matches. `patterns` may be an array or a
 * `:`-joined list. An empty list matches nothing.
 */
export function matchAny(patterns: string | readonly string[], candidate: string): boolean {
  const list = typeof patterns === 'string' ? splitPatterns(patterns) : patterns;
  return list.some((p) => p.length > 0 && match(p, candidate));
}

function selects(patterns: readonly string[], candidate: Candidate): boolean {
  if (matchAny(patterns, candidate.id)) return true;
  return candidate.alias !== undefined && matchAny(patterns, candidate.alias);
}

/**
 * Filter decision: selected by an include pattern and by no exclude pattern.
 * A pattern selects a candidate when it matches its qualified id or its alias.
 */
export function isAllowed(filter: FilterExpression, candidate: Candidate | string): boolean {
  const c = typeof candidate === 'string' ? { id: candidate } : candidate;
  return selects(filter.include, c) && !selects(filter.exclude, c);
}
