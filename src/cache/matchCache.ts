/**
 * Match Cache
 *
 * Owns every known match record, keyed by game id. Records are created on
 * first sighting, refined by later schedule and detail parses, and removed only
 * by age-based pruning.
 */

import { logger } from '../core/logger.js';
import { detailUrl } from '../http/siteClient.js';
import type { MatchRecord, ParsedMatch } from '../types/match.js';
import { isNonNegativeInt, isPlainObject, isValidGameId, isValidTimestamp } from '../util/validation.js';
import type { MatchStore } from './matchStore.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Merges a schedule parse into the known record
 *
 * A non-null parsed value overwrites, a null one keeps what is known. For
 * scores and arena this means a value, once known, is never erased, while a
 * new score always replaces the old one (in-progress matches).
 */
export function mergeParsed(existing: MatchRecord | undefined, parsed: ParsedMatch): MatchRecord {
  if (!existing) return { ...parsed };
  return {
    game_id: existing.game_id,
    start: parsed.start ?? existing.start,
    league: parsed.league ?? existing.league,
    home: parsed.home ?? existing.home,
    away: parsed.away ?? existing.away,
    home_logo: parsed.home_logo ?? existing.home_logo,
    away_logo: parsed.away_logo ?? existing.away_logo,
    tv: parsed.tv ?? existing.tv,
    arena: parsed.arena ?? existing.arena,
    score_home: parsed.score_home ?? existing.score_home,
    score_away: parsed.score_away ?? existing.score_away,
    info_url: parsed.info_url || existing.info_url,
    tickets_url: parsed.tickets_url ?? existing.tickets_url,
    is_live: parsed.is_live,
  };
}

/**
 * Placeholder values the site prints for unknown fields
 */
function isBlank(value: string | null): boolean {
  return value === null || value === '' || value === '-' || value === '—';
}

function fillBlank(existing: string | null, parsed: string | null): string | null {
  return isBlank(existing) && parsed !== null ? parsed : existing;
}

/**
 * Merges a detail-page parse into the known record
 *
 * Detail pages only fill gaps (teams, logos, broadcaster, arena); the schedule
 * remains authoritative for the rest. Scores always refresh, and the live flag
 * is sticky within the merge.
 */
export function mergeDetail(existing: MatchRecord, parsed: ParsedMatch): MatchRecord {
  return {
    ...existing,
    home: fillBlank(existing.home, parsed.home),
    away: fillBlank(existing.away, parsed.away),
    home_logo: fillBlank(existing.home_logo, parsed.home_logo),
    away_logo: fillBlank(existing.away_logo, parsed.away_logo),
    tv: fillBlank(existing.tv, parsed.tv),
    arena: fillBlank(existing.arena, parsed.arena),
    score_home: parsed.score_home ?? existing.score_home,
    score_away: parsed.score_away ?? existing.score_away,
    is_live: parsed.is_live || existing.is_live,
  };
}

/**
 * Start instant in milliseconds, or null when unknown or unparsable
 */
export function startMs(record: Pick<MatchRecord, 'start'>): number | null {
  if (!record.start) return null;
  const ms = Date.parse(record.start);
  return Number.isNaN(ms) ? null : ms;
}

function nullableString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

/**
 * Rebuilds a record from stored data. Returns null for anything that is not a
 * record object under a valid game id; missing fields default to null/false.
 */
export function toMatchRecord(gameId: string, value: unknown): MatchRecord | null {
  if (!isValidGameId(gameId) || !isPlainObject(value)) return null;

  const start = nullableString(value.start);
  const infoUrl = nullableString(value.info_url);
  return {
    game_id: gameId,
    start: start !== null && isValidTimestamp(start) ? start : null,
    league: nullableString(value.league),
    home: nullableString(value.home),
    away: nullableString(value.away),
    home_logo: nullableString(value.home_logo),
    away_logo: nullableString(value.away_logo),
    tv: nullableString(value.tv),
    arena: nullableString(value.arena),
    score_home: isNonNegativeInt(value.score_home) ? value.score_home : null,
    score_away: isNonNegativeInt(value.score_away) ? value.score_away : null,
    info_url: infoUrl || detailUrl(gameId),
    tickets_url: nullableString(value.tickets_url),
    is_live: value.is_live === true,
  };
}

export class MatchCache {
  private readonly records = new Map<string, MatchRecord>();

  constructor(initial: Iterable<MatchRecord> = []) {
    for (const record of initial) this.records.set(record.game_id, record);
  }

  get size(): number {
    return this.records.size;
  }

  get(gameId: string): MatchRecord | undefined {
    return this.records.get(gameId);
  }

  values(): MatchRecord[] {
    return [...this.records.values()];
  }

  /**
   * Merges a schedule parse, creating the record on first sighting
   */
  applySchedule(parsed: ParsedMatch): MatchRecord {
    const merged = mergeParsed(this.records.get(parsed.game_id), parsed);
    this.records.set(parsed.game_id, merged);
    return merged;
  }

  /**
   * Merges a detail-page parse; ignored for ids the cache does not know
   */
  applyDetail(parsed: ParsedMatch): MatchRecord | undefined {
    const existing = this.records.get(parsed.game_id);
    if (!existing) return undefined;
    const merged = mergeDetail(existing, parsed);
    this.records.set(parsed.game_id, merged);
    return merged;
  }

  /**
   * Drops records that started before `now - retentionDays`. Records without a
   * known start are kept: their age cannot be judged.
   *
   * @returns Number of records removed
   */
  prune(now: Date, retentionDays: number): number {
    const cutoff = now.getTime() - retentionDays * DAY_MS;
    let removed = 0;
    for (const [gameId, record] of this.records) {
      const start = startMs(record);
      if (start !== null && start < cutoff) {
        this.records.delete(gameId);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Populates the cache from the store. Never throws: a failed read leaves
   * the cache empty and malformed entries are skipped.
   *
   * @returns Number of records loaded
   */
  async load(store: MatchStore): Promise<number> {
    let state: unknown;
    try {
      state = await store.load();
    } catch (err) {
      logger.warn({ err }, 'Failed to load match state, starting with an empty cache');
      return 0;
    }

    if (!isPlainObject(state) || !isPlainObject(state.games)) {
      if (state !== null) logger.warn('Stored match state has no games mapping, ignoring it');
      return 0;
    }

    let loaded = 0;
    let skipped = 0;
    for (const [gameId, value] of Object.entries(state.games)) {
      const record = toMatchRecord(gameId, value);
      if (record) {
        this.records.set(gameId, record);
        loaded++;
      } else {
        skipped++;
      }
    }
    logger.info({ loaded, skipped }, 'match state loaded');
    return loaded;
  }

  /**
   * Writes the cache to the store. Best-effort: failures are logged.
   *
   * @returns Whether the write succeeded
   */
  async save(store: MatchStore, now: Date = new Date()): Promise<boolean> {
    try {
      await store.save({ saved_at: now.toISOString(), games: Object.fromEntries(this.records) });
      return true;
    } catch (err) {
      logger.warn({ err }, 'Failed to save match state');
      return false;
    }
  }
}
