/**
 * Host pattern matching for Host lines and Match criteria
 */

function toRegExp(pattern: string): RegExp {
  const source = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
  return new RegExp(`^${source}$`, 'is');
}

/**
 * Matches a single `*`/`?` glob against a candidate, case-insensitively
 */
export function matchPattern(pattern: string, candidate: string): boolean {
  if (pattern === '*') {
    return true;
  }
  return toRegExp(pattern).test(candidate);
}

/**
 * Matches a pattern list where `!pattern` entries exclude.
 *
 * The list matches when some positive pattern matches and no negated one
 * does, so a list of only negations never matches.
 */
export function matchPatternList(patterns: readonly string[], candidate: string): boolean {
  let matched = false;
  for (const pattern of patterns) {
    if (pattern.startsWith('!')) {
      if (matchPattern(pattern.slice(1), candidate)) {
        return false;
      }
    } else if (!matched && matchPattern(pattern, candidate)) {
      matched = true;
    }
  }
  return matched;
}

/**
 * Splits a comma-separated Match argument into patterns
 */
export function splitPatternList(value: string): string[] {
  return value.split(',').map(p => p.trim()).filter(p => p.length > 0);
}
