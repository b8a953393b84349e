/**
 * Site Client Module
 *
 * Constructs URLs on the source site: the schedule listing for a team path and
 * the detail page of a single match.
 */

import { cfg } from '../core/config.js';
import { SITE } from '../core/constants.js';
import { isValidUrl, isValidGameId, ValidationError } from '../util/validation.js';

/**
 * Returns the configured site origin
 *
 * @throws ValidationError if the base URL is invalid
 */
export function baseUrl(): string {
  const url = cfg.site.baseUrl;
  if (!isValidUrl(url)) {
    throw new ValidationError(`Invalid site base URL: ${url}`, 'baseUrl');
  }
  return url;
}

/**
 * Resolves an absolute or site-relative reference against the site origin
 *
 * @example
 * resolveUrl('/schedule-item/abc?tab=media')
 * // Returns: https://club.example.org/schedule-item/abc?tab=media
 */
export function resolveUrl(ref: string): string {
  return new URL(ref, baseUrl()).toString();
}

/**
 * Like resolveUrl, but returns null for a reference that does not form a URL
 * (e.g. a malformed host in scraped markup)
 */
export function tryResolveUrl(ref: string): string | null {
  const base = baseUrl();
  try {
    return new URL(ref, base).toString();
  } catch {
    return null;
  }
}

/**
 * Constructs the schedule page URL for a normalized team path
 *
 * @example
 * scheduleUrl('/schedule')
 * // Returns: https://club.example.org/schedule
 */
export function scheduleUrl(teamPath: string): string {
  return resolveUrl(teamPath);
}

/**
 * Constructs the canonical detail page URL for a match
 *
 * @example
 * detailUrl('a1b2c3d4-e5f6-5678-9abc-def012345678')
 * // Returns: https://club.example.org/schedule-item/a1b2c3d4-e5f6-5678-9abc-def012345678
 */
export function detailUrl(gameId: string): string {
  if (!isValidGameId(gameId)) {
    throw new ValidationError(`Invalid game ID format: ${gameId}`, 'gameId');
  }
  return resolveUrl(`${SITE.ITEM_PATH}${gameId}`);
}
