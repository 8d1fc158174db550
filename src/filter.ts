/**
 * Filter string parsing.
 *
 * Format: `include1:include2-exclude1:exclude2`. Patterns are delimited by ':',
 * the first '-' separates inclusion patterns from exclusion patterns, and
 * zero-length patterns are ignored. Malformed input is never rejected; it is
 * split as well as it can be.
 */

import { PATTERN_DELIMITER, WILDCARD, splitPatterns } from './pattern-matcher';
import type { FilterExpression } from './types';

export const NEGATIVE_MARKER = '-';

/** Filter that selects every test. */
export function defaultFilter(): FilterExpression {
  return { include: [WILDCARD], exclude: [] };
}

export function parseFilter(filterStr?: string | null): FilterExpression {
  if (filterStr === undefined || filterStr === null) return defaultFilter();

  const negative = filterStr.indexOf(NEGATIVE_MARKER);
  const includePart = negative < 0 ? filterStr : filterStr.slice(0, negative);
  const excludePart = negative < 0 ? '' : filterStr.slice(negative + 1);

  // Only an absent include part means "everything"; ':' alone selects nothing.
  return {
    include: includePart.length > 0 ? splitPatterns(includePart) : [WILDCARD],
    exclude: splitPatterns(excludePart),
  };
}

/** Renders an expression back into filter-string form. */
export function formatFilter(filter: FilterExpression): string {
  const include = filter.include.join(PATTERN_DELIMITER);
  return filter.exclude.length > 0
    ? `${include}${NEGATIVE_MARKER}${filter.exclude.join(PATTERN_DELIMITER)}`
    : include;
}
