/**
 * Validation Utilities
 *
 * Functions for validating external inputs to prevent invalid data
 * from propagating through the system.
 */

export { ValidationError } from '../errors/index.js';

/**
 * UUID-shaped token used by the source site to identify a match
 */
export const GAME_ID_PATTERN = '[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}';

/**
 * Validates a game ID (UUID format)
 *
 * @param gameId - Game ID to validate
 * @returns True if valid UUID format, false otherwise
 */
export function isValidGameId(gameId: string): boolean {
  return new RegExp(`^${GAME_ID_PATTERN}$`, 'i').test(gameId);
}

/**
 * Validates a URL string
 *
 * @param url - URL to validate
 * @returns True if valid URL, false otherwise
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Checks that a value is a non-negative integer (scores)
 */
export function isNonNegativeInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Checks that a value is a plain (non-array) object
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks that an ISO timestamp string parses to a real instant
 */
export function isValidTimestamp(value: string): boolean {
  return !Number.isNaN(Date.parse(value));
}
