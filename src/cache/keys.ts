/**
 * Redis Key Generators
 *
 * Centralized key generation for Redis entries.
 * Ensures consistent key naming across the application.
 */

import { STORAGE } from '../core/constants.js';

export const KEYS = {
  /** Stores the persisted match state document ({ saved_at, games }) */
  state: (version: number = STORAGE.VERSION) => `${STORAGE.KEY}:v${version}`,

  /** Stores the hash of the last snapshot published for a team path */
  snapshotHash: (teamPath: string) => `matchday:snapshot-hash:${teamPath}`,
};
