/**
 * Classifier
 *
 * Buckets cached matches for display: live, upcoming and finished.
 */

import { CLASSIFY } from '../core/constants.js';
import { startMs } from '../cache/matchCache.js';
import type { Classification, MatchRecord } from '../types/match.js';

const HOUR_MS = 60 * 60 * 1000;

function hasScore(record: MatchRecord): boolean {
  return record.score_home !== null && record.score_away !== null;
}

/**
 * Sort key; a missing start sorts as the empty string
 */
function startKey(record: MatchRecord): string {
  return record.start ?? '';
}

function compareStart(a: MatchRecord, b: MatchRecord): number {
  const ka = startKey(a);
  const kb = startKey(b);
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}

/**
 * Splits records into display buckets
 *
 * - Records without a parsable start are left out entirely.
 * - Live-flagged records never appear in upcoming/finished; the one with the
 *   latest start is reported as `live`.
 * - upcoming: start after now, soonest first.
 * - finished: start at or before now, with both scores or started within the
 *   last 6 hours, most recent first.
 */
export function classify(records: Iterable<MatchRecord>, now: Date): Classification {
  const nowMs = now.getTime();
  const recentCutoff = nowMs - CLASSIFY.RECENT_UNSCORED_HOURS * HOUR_MS;

  let live: MatchRecord | null = null;
  const upcoming: MatchRecord[] = [];
  const finished: MatchRecord[] = [];

  for (const record of records) {
    const start = startMs(record);
    if (start === null) continue;

    if (record.is_live) {
      if (!live || compareStart(record, live) > 0) live = record;
      continue;
    }

    if (start > nowMs) {
      upcoming.push(record);
    } else if (hasScore(record) || start > recentCutoff) {
      finished.push(record);
    }
  }

  upcoming.sort(compareStart);
  finished.sort((a, b) => compareStart(b, a));
  return { live, upcoming, finished };
}

/**
 * Most recent finished match that has both scores
 */
export function lastFinishedWithScore(finished: readonly MatchRecord[]): MatchRecord | null {
  return finished.find(hasScore) ?? null;
}

/**
 * Picks the matches worth a detail-page fetch this cycle
 *
 * The live match alone when there is one; otherwise up to two of the three
 * most recent finished matches that started within 24 hours and still miss a
 * score.
 */
export function selectDetailTargets(classification: Classification, now: Date): MatchRecord[] {
  if (classification.live) return [classification.live];

  const lookback = now.getTime() - CLASSIFY.DETAIL_LOOKBACK_HOURS * HOUR_MS;
  return classification.finished
    .slice(0, CLASSIFY.DETAIL_CANDIDATES)
    .filter(record => {
      const start = startMs(record);
      return start !== null && start > lookback && !hasScore(record);
    })
    .slice(0, CLASSIFY.MAX_DETAIL_TARGETS);
}
