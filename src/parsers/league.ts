/**
 * League Parser
 *
 * Matches the window against a fixed catalogue of competitions. Display
 * variants (case, diacritics, \uXXXX escapes, abbreviations) collapse to one
 * canonical name per entry.
 */

import { escapeRegExp, foldText } from './text.js';
import { capture, firstMatch, type Matcher } from './strategy.js';

export interface LeagueEntry {
  /** Name reported for any alias of this entry */
  name: string;
  aliases: readonly string[];
}

/**
 * Known competitions, checked in order; the first entry with a hit wins
 */
export const KNOWN_LEAGUES: readonly LeagueEntry[] = [
  { name: 'EuroLeague', aliases: ['EuroLeague', 'Eurolyga'] },
  { name: 'Lietuvos krepšinio lyga', aliases: ['Lietuvos krepšinio lyga', 'LKL'] },
  { name: 'Karaliaus Mindaugo taurė', aliases: ['Karaliaus Mindaugo taurė', 'KMT'] },
];

// Short abbreviations only count as whole words
const ABBREVIATION_MAX_LENGTH = 4;

function aliasMatcher(alias: string): (folded: string) => boolean {
  const needle = foldText(alias);
  if (needle.length <= ABBREVIATION_MAX_LENGTH) {
    const re = new RegExp(`\\b${escapeRegExp(needle)}\\b`);
    return (folded) => re.test(folded);
  }
  return (folded) => folded.includes(needle);
}

function catalogueMatcher(entries: readonly LeagueEntry[]): Matcher<string> {
  const compiled = entries.map(e => ({ name: e.name, tests: e.aliases.map(aliasMatcher) }));
  return (text) => {
    const folded = foldText(text);
    const hit = compiled.find(e => e.tests.some(test => test(folded)));
    return hit ? hit.name : null;
  };
}

const LEAGUE_MATCHERS: readonly Matcher<string>[] = [
  catalogueMatcher(KNOWN_LEAGUES),
  // Small grey header line above the teams
  capture(/text-white\/60 text-2xs truncate[^>]*>([^<]{3,60})<\/p>/),
];

export function parseLeague(window: string): string | null {
  return firstMatch(LEAGUE_MATCHERS, window);
}
