/**
 * Snapshot Publisher
 *
 * Publishes snapshots to the presentation layer only when their content
 * changed. The hash of the last published snapshot is kept in Redis so a
 * restart does not republish an unchanged schedule.
 */

import { logger } from '../core/logger.js';
import { KEYS } from '../cache/keys.js';
import type { KeyValueClient } from '../cache/redisClient.js';
import { PublishError, toError } from '../errors/index.js';
import type { SnapshotMessage } from '../models/messages.js';
import type { Snapshot } from '../types/match.js';
import { sha256 } from '../util/hash.js';

export type SnapshotSender = (key: string, message: SnapshotMessage) => Promise<void>;

/**
 * Hash of the parts of a snapshot a consumer cares about. Fetch time and
 * diagnostics change every cycle and are left out.
 */
export function snapshotHash(snapshot: Snapshot): string {
  const { fetched_at: _fetchedAt, debug: _debug, ...content } = snapshot;
  return sha256(JSON.stringify(content));
}

export class SnapshotPublisher {
  constructor(
    private readonly send: SnapshotSender,
    private readonly hashes: KeyValueClient
  ) {}

  /**
   * @returns true when a message was sent, false when the content was unchanged
   * @throws PublishError when the message or its hash cannot be written
   */
  async publish(snapshot: Snapshot): Promise<boolean> {
    const hash = snapshotHash(snapshot);
    const hashKey = KEYS.snapshotHash(snapshot.team_path);

    try {
      const previous = await this.hashes.get(hashKey);
      if (previous === hash) {
        logger.debug({ teamPath: snapshot.team_path }, 'snapshot unchanged');
        return false;
      }

      const message: SnapshotMessage = {
        eventType: 'snapshot',
        teamPath: snapshot.team_path,
        source: 'schedule_page',
        version: 'v1',
        fetchedAt: snapshot.fetched_at,
        hash,
        payload: snapshot
      };
      await this.send(snapshot.team_path, message);
      await this.hashes.set(hashKey, hash);
    } catch (err) {
      const error = toError(err);
      throw new PublishError(`Failed to publish snapshot: ${error.message}`, 'publishSnapshot', error);
    }

    logger.info({ teamPath: snapshot.team_path, hash }, 'snapshot published');
    return true;
  }
}
