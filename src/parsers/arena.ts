/**
 * Arena Parser
 *
 * Schedule cards rarely carry the venue; detail pages usually do.
 */

import { firstMatch, labelledValue } from './strategy.js';

export const ARENA_HEADINGS = ['Arena', 'Venue'] as const;

const ARENA_MATCHERS = labelledValue(ARENA_HEADINGS, 80);

export function parseArena(window: string): string | null {
  return firstMatch(ARENA_MATCHERS, window);
}
