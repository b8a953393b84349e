/**
 * Match Store
 *
 * Loads and saves the persisted match state document. The document is kept
 * under one versioned key as JSON: { saved_at, games }.
 */

import { logger } from '../core/logger.js';
import { StorageLoadError, StorageSaveError, toError } from '../errors/index.js';
import type { PersistedState } from '../types/match.js';
import { KEYS } from './keys.js';
import type { KeyValueClient } from './redisClient.js';

/**
 * Load/save contract of the key-value store collaborator
 */
export interface MatchStore {
  /**
   * Returns the stored document as untrusted data, or null when nothing is stored
   *
   * @throws StorageLoadError when the store cannot be read
   */
  load(): Promise<unknown>;

  /**
   * @throws StorageSaveError when the store cannot be written
   */
  save(state: PersistedState): Promise<void>;
}

/**
 * Redis-backed store
 */
export class RedisMatchStore implements MatchStore {
  constructor(
    private readonly client: KeyValueClient,
    private readonly key: string = KEYS.state()
  ) {}

  async load(): Promise<unknown> {
    let raw: string | null;
    try {
      raw = await this.client.get(this.key);
    } catch (err) {
      const error = toError(err);
      throw new StorageLoadError(`Failed to read match state: ${error.message}`, this.key, error);
    }
    if (raw === null) return null;

    try {
      return JSON.parse(raw);
    } catch (err) {
      const error = toError(err);
      throw new StorageLoadError(`Stored match state is not valid JSON: ${error.message}`, this.key, error);
    }
  }

  async save(state: PersistedState): Promise<void> {
    try {
      await this.client.set(this.key, JSON.stringify(state));
      logger.debug({ key: this.key, games: Object.keys(state.games).length }, 'match state saved');
    } catch (err) {
      const error = toError(err);
      throw new StorageSaveError(`Failed to write match state: ${error.message}`, this.key, error);
    }
  }
}
