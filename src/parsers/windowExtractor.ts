/**
 * Window Extractor
 *
 * Cuts the part of the schedule page that describes one match. Field parsers
 * only ever see this window, so a window that bleeds into the neighbouring card
 * would mix up teams and scores of adjacent matches.
 */

import { SITE, WINDOW } from '../core/constants.js';
import { escapeRegExp } from './text.js';
import { firstMatch, type Matcher } from './strategy.js';

function indexOf(pattern: RegExp): Matcher<number> {
  return (text) => {
    const m = pattern.exec(text);
    return m ? m.index : null;
  };
}

/**
 * Anchor lookups for one match, most reliable first
 */
function anchorMatchers(gameId: string): Matcher<number>[] {
  const id = escapeRegExp(gameId);
  const tab = `${escapeRegExp(SITE.ITEM_PATH)}${id}${escapeRegExp(WINDOW.TAB_QUERY)}`;
  return [
    indexOf(new RegExp(`href="[^"]*${tab}`, 'i')),
    indexOf(new RegExp(`\\\\"href\\\\":\\\\"[^\\\\"]*${tab}`, 'i')),
    indexOf(new RegExp(`href="[^"]*${id}`, 'i')),
    indexOf(new RegExp(`\\\\"href\\\\":\\\\"[^\\\\"]*${id}`, 'i')),
    indexOf(new RegExp(`"[^"\\s<>]*${id}`, 'i')),
    (text) => {
      const at = text.toLowerCase().indexOf(gameId.toLowerCase());
      return at >= 0 ? at : null;
    },
  ];
}

/**
 * Position of the best occurrence of the match id, or 0 when absent
 */
export function locateAnchor(html: string, gameId: string): number {
  return firstMatch(anchorMatchers(gameId), html) ?? 0;
}

/**
 * The card enclosing `index`, if its length is plausible for one match
 */
export function enclosingCard(html: string, index: number): string | null {
  const open = html.lastIndexOf(WINDOW.CARD_OPEN, index);
  if (open < 0) return null;

  // A close between the open and the anchor means the anchor is outside that card
  if (html.lastIndexOf(WINDOW.CARD_CLOSE, index) > open) return null;

  const close = html.indexOf(WINDOW.CARD_CLOSE, index);
  if (close < 0) return null;

  const end = close + WINDOW.CARD_CLOSE.length;
  const length = end - open;
  if (length < WINDOW.MIN_CARD_LENGTH || length > WINDOW.MAX_CARD_LENGTH) return null;
  return html.slice(open, end);
}

/**
 * Returns the text window describing one match
 *
 * @param size - Width of the fallback window centred on the anchor
 */
export function extractWindow(html: string, gameId: string, size: number = WINDOW.DEFAULT_SIZE): string {
  const index = locateAnchor(html, gameId);
  const card = enclosingCard(html, index);
  if (card !== null) return card;

  const half = Math.floor(size / 2);
  return html.slice(Math.max(0, index - half), Math.min(html.length, index + half));
}
