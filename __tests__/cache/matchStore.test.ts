import { describe, it, expect } from 'vitest';
import { RedisMatchStore } from '../../src/cache/matchStore.js';
import type { KeyValueClient } from '../../src/cache/redisClient.js';
import { StorageLoadError, StorageSaveError } from '../../src/errors/index.js';
import type { PersistedState } from '../../src/types/match.js';
import { record } from '../helpers/fixtures.js';

const ID_A = '11111111-1111-4111-8111-111111111111';

class MemoryKeyValue implements KeyValueClient {
  readonly data = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<unknown> {
    this.data.set(key, value);
    return 'OK';
  }
}

const brokenClient: KeyValueClient = {
  get: async () => { throw new Error('connection lost'); },
  set: async () => { throw new Error('connection lost'); }
};

describe('RedisMatchStore', () => {
  const state: PersistedState = {
    saved_at: '2025-03-01T12:00:00.000Z',
    games: { [ID_A]: record(ID_A, { home: 'Kaunas Lions' }) }
  };

  it('should save under the versioned key and load it back', async () => {
    const client = new MemoryKeyValue();
    const store = new RedisMatchStore(client);

    await store.save(state);

    expect([...client.data.keys()]).toEqual(['matchday:state:v1']);
    expect(await store.load()).toEqual(state);
  });

  it('should return null when nothing is stored', async () => {
    expect(await new RedisMatchStore(new MemoryKeyValue()).load()).toBeNull();
  });

  it('should reject invalid JSON with a load error', async () => {
    const client = new MemoryKeyValue();
    client.data.set('matchday:state:v1', '{not json');

    await expect(new RedisMatchStore(client).load()).rejects.toBeInstanceOf(StorageLoadError);
  });

  it('should wrap read failures', async () => {
    const error = await new RedisMatchStore(brokenClient).load().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StorageLoadError);
    expect(error).toHaveProperty('key', 'matchday:state:v1');
    expect(error).toHaveProperty('message', 'Failed to read match state: connection lost');
  });

  it('should wrap write failures', async () => {
    await expect(new RedisMatchStore(brokenClient).save(state)).rejects.toBeInstanceOf(StorageSaveError);
  });
});
