/**
 * Hash Utility Module
 *
 * Provides cryptographic hashing functions for change detection.
 * Used to compare snapshots without storing full payloads.
 */

import crypto from 'crypto';

/**
 * Generates SHA256 hash of input data
 *
 * If the hash of new data matches the hash of previous data,
 * the content is identical and no update needs to be published.
 *
 * @param data - String data to hash (typically JSON stringified snapshot content)
 * @returns Hexadecimal hash string (64 characters)
 */
export function sha256(data: string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}
