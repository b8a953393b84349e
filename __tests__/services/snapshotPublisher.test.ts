import { describe, it, expect, vi } from 'vitest';
import type { KeyValueClient } from '../../src/cache/redisClient.js';
import { PublishError } from '../../src/errors/index.js';
import type { SnapshotMessage } from '../../src/models/messages.js';
import { SnapshotPublisher, snapshotHash } from '../../src/services/snapshotPublisher.js';
import type { Snapshot } from '../../src/types/match.js';
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

function snapshot(fetchedAt: string, scoreHome: number | null = null): Snapshot {
  const match = record(ID_A, { start: '2025-03-01T10:00:00.000Z', score_home: scoreHome, score_away: scoreHome === null ? null : 70 });
  return {
    team_path: '/schedule',
    source_url: 'https://club.example.org/schedule',
    fetched_at: fetchedAt,
    live: null,
    upcoming: [],
    finished: [match],
    last_finished_with_score: scoreHome === null ? null : match,
    debug: {
      parse_mode: 'href',
      links_found: 1,
      matches_found: 1,
      has_item_path: true,
      has_uuid: true,
      html_head: '<html>',
      detail_targets: [],
      detail_failures: 0,
      cache_size: 1
    }
  };
}

describe('SnapshotPublisher', () => {
  it('should ignore fetch time and diagnostics when hashing', () => {
    const a = snapshot('2025-03-01T12:00:00.000Z');
    const b = { ...snapshot('2025-03-01T12:10:00.000Z'), debug: { ...a.debug, cache_size: 9 } };
    expect(snapshotHash(a)).toBe(snapshotHash(b));
    expect(snapshotHash(a)).not.toBe(snapshotHash(snapshot('2025-03-01T12:00:00.000Z', 72)));
  });

  it('should publish the first snapshot keyed by team path', async () => {
    const send = vi.fn(async (_key: string, _message: SnapshotMessage) => undefined);
    const hashes = new MemoryKeyValue();
    const publisher = new SnapshotPublisher(send, hashes);
    const first = snapshot('2025-03-01T12:00:00.000Z');

    expect(await publisher.publish(first)).toBe(true);
    expect(send).toHaveBeenCalledWith('/schedule', {
      eventType: 'snapshot',
      teamPath: '/schedule',
      source: 'schedule_page',
      version: 'v1',
      fetchedAt: '2025-03-01T12:00:00.000Z',
      hash: snapshotHash(first),
      payload: first
    });
    expect(hashes.data.get('matchday:snapshot-hash:/schedule')).toBe(snapshotHash(first));
  });

  it('should skip unchanged content and publish changes', async () => {
    const send = vi.fn(async (_key: string, _message: SnapshotMessage) => undefined);
    const publisher = new SnapshotPublisher(send, new MemoryKeyValue());

    expect(await publisher.publish(snapshot('2025-03-01T12:00:00.000Z'))).toBe(true);
    expect(await publisher.publish(snapshot('2025-03-01T12:10:00.000Z'))).toBe(false);
    expect(await publisher.publish(snapshot('2025-03-01T12:20:00.000Z', 72))).toBe(true);
    expect(send).toHaveBeenCalledTimes(2);
  });

  it('should wrap send failures and leave the stored hash alone', async () => {
    const send = vi.fn(async (_key: string, _message: SnapshotMessage) => { throw new Error('broker down'); });
    const hashes = new MemoryKeyValue();
    const publisher = new SnapshotPublisher(send, hashes);

    await expect(publisher.publish(snapshot('2025-03-01T12:00:00.000Z'))).rejects.toBeInstanceOf(PublishError);
    expect(hashes.data.size).toBe(0);
  });
});
