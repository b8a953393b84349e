/**
 * Match Parser
 *
 * Runs every field parser over one window and assembles a ParsedMatch.
 */

import type { ParsedMatch } from '../types/match.js';
import { parseArena } from './arena.js';
import { parseBroadcaster } from './broadcaster.js';
import { parseLeague } from './league.js';
import { parseDetailUrl, parseTicketsUrl } from './links.js';
import { parseLiveFlag } from './liveFlag.js';
import { parseScore } from './score.js';
import { parseStart } from './startTime.js';
import { parseTeams } from './teams.js';

export interface MatchParseOptions {
  /** Anchor for start-time year inference */
  now?: Date;
  clubBadgeAlt?: string;
  ticketHosts?: readonly string[];
}

export function parseMatchWindow(gameId: string, window: string, options: MatchParseOptions = {}): ParsedMatch {
  const start = parseStart(window, options.now ?? new Date());
  const teams = parseTeams(window, options.clubBadgeAlt);
  const score = parseScore(window);

  return {
    game_id: gameId,
    start: start ? start.toISOString() : null,
    league: parseLeague(window),
    home: teams.home,
    away: teams.away,
    home_logo: teams.home_logo,
    away_logo: teams.away_logo,
    tv: parseBroadcaster(window),
    arena: parseArena(window),
    score_home: score.score_home,
    score_away: score.score_away,
    info_url: parseDetailUrl(gameId, window),
    tickets_url: parseTicketsUrl(window, options.ticketHosts),
    is_live: parseLiveFlag(window),
  };
}
