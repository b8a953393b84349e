/**
 * Match Type Definitions
 *
 * Records, parses and snapshots exchanged between the parsers, the cache and
 * the outbound snapshot. Keys are snake_case because these objects are stored
 * and published as-is.
 */

/**
 * One match as known to the cache
 */
export interface MatchRecord {
  game_id: string;
  start: string | null; // ISO-8601 UTC instant
  league: string | null;
  home: string | null;
  away: string | null;
  home_logo: string | null;
  away_logo: string | null;
  tv: string | null;
  arena: string | null;
  score_home: number | null;
  score_away: number | null;
  info_url: string;
  tickets_url: string | null;
  is_live: boolean;
}

/**
 * Fields extracted from one window. Same shape as a record; every nullable
 * field may be null when its parser found nothing.
 */
export type ParsedMatch = MatchRecord;

/**
 * Diagnostics about how well the schedule page parsed
 */
export interface ScheduleDebug {
  parse_mode: 'href';
  links_found: number;
  matches_found: number;
  has_item_path: boolean;
  has_uuid: boolean;
  html_head: string;
}

/**
 * Diagnostics for one update cycle
 */
export interface CycleDebug extends ScheduleDebug {
  detail_targets: string[];
  detail_failures: number;
  cache_size: number;
}

/**
 * Matches split into display buckets
 */
export interface Classification {
  live: MatchRecord | null;
  upcoming: MatchRecord[];
  finished: MatchRecord[];
}

/**
 * Public result of one update cycle
 */
export interface Snapshot {
  team_path: string;
  source_url: string;
  fetched_at: string;
  live: MatchRecord | null;
  upcoming: MatchRecord[];
  finished: MatchRecord[];
  last_finished_with_score: MatchRecord | null;
  debug: CycleDebug;
}

/**
 * Document written to the key-value store
 */
export interface PersistedState {
  saved_at: string;
  games: Record<string, MatchRecord>;
}
