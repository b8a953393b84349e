/**
 * Matcher Strategies
 *
 * Every field parser is an ordered list of independent matchers. Each matcher
 * covers one markup dialect (plain HTML, escaped JSON embedded in HTML, ...)
 * and returns null when it finds nothing usable. The first non-null result
 * wins, so adding a dialect never changes what earlier matchers return.
 */

import { escapeRegExp, unescapeEntities } from './text.js';

/**
 * A single extraction strategy over a text window
 */
export type Matcher<T> = (text: string) => T | null;

/**
 * Runs matchers in priority order and returns the first non-null result
 */
export function firstMatch<T>(matchers: readonly Matcher<T>[], text: string): T | null {
  for (const matcher of matchers) {
    const value = matcher(text);
    if (value !== null) return value;
  }
  return null;
}

/**
 * Matcher returning a trimmed, unescaped capture group of the first regex hit.
 * Blank captures count as no match.
 */
export function capture(pattern: RegExp, group = 1): Matcher<string> {
  return (text) => {
    const m = pattern.exec(text);
    const raw = m?.[group]?.trim();
    return raw ? unescapeEntities(raw) : null;
  };
}

/**
 * Matchers for a value printed right after a section heading, e.g.
 *
 *   <p>Broadcasts</p><p class="...">TV3</p>
 *   \"children\":\"Broadcasts\"}...  ->  Broadcasts\",\"children\":\"TV3
 *
 * HTML matchers for every heading come first, then the escaped-JSON ones.
 */
export function labelledValue(headings: readonly string[], maxLength: number): Matcher<string>[] {
  const html = headings.map(h =>
    capture(new RegExp(`${escapeRegExp(h)}\\s*</p>\\s*<p[^>]*>([^<]{1,${maxLength}})</p>`, 'i'))
  );
  const escaped = headings.map(h =>
    capture(new RegExp(`${escapeRegExp(h)}\\\\",\\\\"children\\\\":\\\\"([^\\\\"]{1,${maxLength}})`, 'i'))
  );
  return [...html, ...escaped];
}
