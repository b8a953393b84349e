/**
 * Link Parsers
 *
 * Detail-page and ticket links found inside a match window.
 */

import { cfg } from '../core/config.js';
import { SITE } from '../core/constants.js';
import { detailUrl, tryResolveUrl } from '../http/siteClient.js';
import { escapeRegExp, unescapeEntities } from './text.js';
import { firstMatch, type Matcher } from './strategy.js';

function hrefMatcher(pattern: RegExp): Matcher<string> {
  return (text) => {
    const m = pattern.exec(text);
    // An unparsable href counts as no match
    return m ? tryResolveUrl(unescapeEntities(m[1])) : null;
  };
}

/**
 * Builds the matchers for one match, most specific first:
 * links carrying extra query parameters (e.g. ?tab=media) beat bare links,
 * and plain HTML beats escaped JSON.
 */
function detailMatchers(gameId: string): Matcher<string>[] {
  const target = `${escapeRegExp(SITE.ITEM_PATH)}${escapeRegExp(gameId)}`;
  return [
    hrefMatcher(new RegExp(`href="([^"]*${target}\\?[^"]*)"`, 'i')),
    hrefMatcher(new RegExp(`\\\\"href\\\\":\\\\"([^\\\\"]*${target}\\?[^\\\\"]*)\\\\"`, 'i')),
    hrefMatcher(new RegExp(`href="([^"]*${target}[^"]*)"`, 'i')),
    hrefMatcher(new RegExp(`\\\\"href\\\\":\\\\"([^\\\\"]*${target}[^\\\\"]*)\\\\"`, 'i')),
  ];
}

/**
 * Returns the detail page URL for a match, synthesizing the canonical one
 * when the window has no matching anchor
 */
export function parseDetailUrl(gameId: string, window: string): string {
  return firstMatch(detailMatchers(gameId), window) ?? detailUrl(gameId);
}

/**
 * Returns the first link to a ticketing host (subdomains included)
 */
export function parseTicketsUrl(window: string, hosts: readonly string[] = cfg.site.ticketHosts): string | null {
  if (hosts.length === 0) return null;
  const hostPattern = hosts.map(escapeRegExp).join('|');
  const re = new RegExp(`https?://(?:[a-z0-9-]+\\.)*(?:${hostPattern})[^\\s"'<>\\\\]*`, 'i');
  const m = re.exec(window);
  return m ? unescapeEntities(m[0]) : null;
}
