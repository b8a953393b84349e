/**
 * Schedule Parser
 *
 * Lists the match identifiers linked from a schedule page and reports how
 * well the page parsed.
 */

import { SITE } from '../core/constants.js';
import { GAME_ID_PATTERN } from '../util/validation.js';
import type { ScheduleDebug } from '../types/match.js';
import { escapeRegExp } from './text.js';

export interface ScheduleParse {
  /** Distinct ids, lower-cased, in order of first appearance */
  gameIds: string[];
  debug: ScheduleDebug;
}

const HEAD_LENGTH = 160;

export function parseSchedule(html: string): ScheduleParse {
  const linkRe = new RegExp(`${escapeRegExp(SITE.ITEM_PATH)}(${GAME_ID_PATTERN})`, 'gi');
  const links = Array.from(html.matchAll(linkRe), m => m[1].toLowerCase());
  const gameIds = [...new Set(links)];

  return {
    gameIds,
    debug: {
      parse_mode: 'href',
      links_found: links.length,
      matches_found: gameIds.length,
      has_item_path: html.includes(SITE.ITEM_PATH),
      has_uuid: gameIds.length > 0,
      html_head: html.slice(0, HEAD_LENGTH).replace(/\n/g, ' '),
    },
  };
}
