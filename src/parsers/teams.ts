/**
 * Teams and Logos Parser
 *
 * Team names come from image alt texts. The first distinct name is treated as
 * home and the next different one as away; logos are looked up by name.
 */

import { cfg } from '../core/config.js';
import { foldText, unescapeEntities } from './text.js';

export interface TeamsAndLogos {
  home: string | null;
  away: string | null;
  home_logo: string | null;
  away_logo: string | null;
}

const MAX_NAMES = 4;

const ALT_HTML = /alt="([^"]{2,50})"/g;
const ALT_ESCAPED = /\\"alt\\":\\"([^\\"]{2,50})\\"/g;

/**
 * Image patterns yielding [src, alt] pairs, in priority order
 */
const LOGO_SOURCES: ReadonlyArray<{ pattern: RegExp; src: number; alt: number }> = [
  { pattern: /<img[^>]+src="([^"]+)"[^>]+alt="([^"]+)"/gi, src: 1, alt: 2 },
  { pattern: /<img[^>]+alt="([^"]+)"[^>]+src="([^"]+)"/gi, src: 2, alt: 1 },
  { pattern: /\\"src\\":\\"([^\\"]+)\\"[^}]+?\\"alt\\":\\"([^\\"]+)\\"/gi, src: 1, alt: 2 },
];

function clean(raw: string): string {
  return unescapeEntities(raw.trim());
}

/**
 * Maps team name to logo URL; the first occurrence of a name wins
 */
export function collectLogos(window: string): Map<string, string> {
  const logos = new Map<string, string>();
  for (const { pattern, src, alt } of LOGO_SOURCES) {
    for (const m of window.matchAll(pattern)) {
      const name = clean(m[alt]);
      if (name && !logos.has(name)) logos.set(name, clean(m[src]));
    }
  }
  return logos;
}

/**
 * Distinct alt texts in document order, up to four. Escaped-JSON alts are only
 * consulted while fewer than two names were found in plain HTML.
 */
export function collectTeamNames(window: string, clubBadgeAlt: string = cfg.site.clubBadgeAlt): string[] {
  const sentinel = foldText(clubBadgeAlt);
  const names: string[] = [];

  for (const pattern of [ALT_HTML, ALT_ESCAPED]) {
    if (names.length >= 2) break;
    for (const m of window.matchAll(pattern)) {
      const name = clean(m[1]);
      if (name && !names.includes(name) && foldText(name) !== sentinel) {
        names.push(name);
      }
      if (names.length >= MAX_NAMES) break;
    }
  }
  return names;
}

/**
 * Extracts home/away names and their logos from a match window
 */
export function parseTeams(window: string, clubBadgeAlt: string = cfg.site.clubBadgeAlt): TeamsAndLogos {
  const names = collectTeamNames(window, clubBadgeAlt);
  const home = names[0] ?? null;
  const away = names.slice(1).find(n => n !== home) ?? null;
  const logos = collectLogos(window);

  return {
    home,
    away,
    home_logo: home ? logos.get(home) ?? null : null,
    away_logo: away ? logos.get(away) ?? null : null,
  };
}
