/**
 * Broadcaster Parser
 */

import { firstMatch, labelledValue } from './strategy.js';

export const BROADCAST_HEADINGS = ['Broadcasts', 'Transliacijos'] as const;

const TV_MATCHERS = labelledValue(BROADCAST_HEADINGS, 60);

/**
 * Returns the broadcaster printed under the "Broadcasts" heading
 */
export function parseBroadcaster(window: string): string | null {
  return firstMatch(TV_MATCHERS, window);
}
