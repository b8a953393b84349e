/**
 * Poll Interval Utility
 *
 * Picks the delay until the next update cycle. A live match tightens the
 * interval so score changes are caught promptly; once no live match remains
 * the normal interval applies again.
 */

import type { Settings } from '../core/config.js';

/**
 * Returns the next polling interval in seconds
 *
 * @param settings - Settings read at the start of the cycle
 * @param hasLive - Whether the cycle found a live match
 *
 * @example
 * nextIntervalSeconds({ pollIntervalSeconds: 600, livePollIntervalSeconds: 20, ... }, true)  // 20
 * nextIntervalSeconds({ pollIntervalSeconds: 600, livePollIntervalSeconds: 20, ... }, false) // 600
 */
export function nextIntervalSeconds(
  settings: Pick<Settings, 'pollIntervalSeconds' | 'livePollIntervalSeconds'>,
  hasLive: boolean
): number {
  if (!hasLive) return settings.pollIntervalSeconds;
  return Math.min(settings.livePollIntervalSeconds, settings.pollIntervalSeconds);
}

/**
 * Converts an interval in seconds to a timer delay in milliseconds
 */
export function toDelayMs(seconds: number): number {
  return Math.max(0, Math.round(seconds * 1000));
}
