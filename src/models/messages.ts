/**
 * Message Models
 *
 * Defines the structure of messages published to Kafka.
 */

import type { Snapshot } from '../types/match.js';

/**
 * Snapshot message structure
 *
 * Published whenever a cycle produces a snapshot whose content differs from
 * the previously published one.
 */
export interface SnapshotMessage {
  /** Always 'snapshot' for this topic */
  eventType: 'snapshot';

  /** Team path the snapshot describes (also used as the message key) */
  teamPath: string;

  /** Data source identifier */
  source: 'schedule_page';

  /** Message schema version */
  version: 'v1';

  /** ISO timestamp when the schedule page was fetched */
  fetchedAt: string;

  /** SHA256 of the snapshot content, excluding fetch time and diagnostics */
  hash: string;

  payload: Snapshot;
}
