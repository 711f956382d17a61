/**
 * @fileoverview Marker glob translation
 *
 * Supported syntax:
 * - `**` matches any substring, `/` included
 * - `*`  matches any substring without `/`
 * - every other character is literal
 *
 * The resulting expression is anchored at both ends, so a pattern without
 * wildcards only matches its own text.
 */

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;

export function escapeRegExp(text: string): string {
  return text.replace(REGEX_SPECIALS, '\\$&');
}

/**
 * Translate a marker glob into an anchored regular expression.
 *
 * @example
 * globToRegExp('*.json').test('package.json')        // true
 * globToRegExp('*env').test('environment/sub')       // false
 * globToRegExp('usr/**').test('usr/local/bin')       // true
 */
export function globToRegExp(pattern: string): RegExp {
  // Escape first (`*` included), then expand the escaped wildcards.
  // `**` goes before `*` so the double star is never read as two singles.
  const source = escapeRegExp(pattern)
    .replace(/\\\*\\\*/g, '.*')
    .replace(/\\\*/g, '[^/]*');
  return new RegExp(`^${source}$`);
}
