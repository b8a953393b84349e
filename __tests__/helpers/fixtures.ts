/**
 * Test fixtures: in-process stand-ins for the fetcher and the store, plus
 * builders for records and schedule-page markup.
 */

import type { MatchStore } from '../../src/cache/matchStore.js';
import type { PageFetcher } from '../../src/http/conditionalFetcher.js';
import type { Settings } from '../../src/core/config.js';
import { FetchError } from '../../src/errors/index.js';
import type { MatchRecord, PersistedState } from '../../src/types/match.js';

export const BASE = 'https://club.example.org';

export const SETTINGS: Settings = {
  teamPath: '/schedule',
  pollIntervalSeconds: 600,
  livePollIntervalSeconds: 20,
  retentionDays: 60
};

export function record(gameId: string, overrides: Partial<MatchRecord> = {}): MatchRecord {
  return {
    game_id: gameId,
    start: null,
    league: null,
    home: null,
    away: null,
    home_logo: null,
    away_logo: null,
    tv: null,
    arena: null,
    score_home: null,
    score_away: null,
    info_url: `${BASE}/schedule-item/${gameId}`,
    tickets_url: null,
    is_live: false,
    ...overrides
  };
}

/**
 * Serves canned pages by URL; unknown URLs fail like a 404
 */
export class FakeFetcher implements PageFetcher {
  readonly calls: string[] = [];

  constructor(private readonly pages: Record<string, string | Error>) {}

  async fetch(url: string): Promise<string> {
    this.calls.push(url);
    const page = this.pages[url];
    if (page === undefined) throw new FetchError(`Unexpected status 404 for ${url}`, url, 404);
    if (page instanceof Error) throw page;
    return page;
  }
}

/**
 * Keeps the persisted document in memory, as a JSON round-trip would
 */
export class MemoryStore implements MatchStore {
  readonly saved: PersistedState[] = [];

  constructor(private stored: unknown = null) {}

  async load(): Promise<unknown> {
    return this.stored;
  }

  async save(state: PersistedState): Promise<void> {
    this.saved.push(state);
    this.stored = JSON.parse(JSON.stringify(state));
  }
}

/** Filler that keeps a card above the minimum card length */
export const PAD = `<div class="pad">${'.'.repeat(900)}</div>`;

/**
 * One schedule card in plain HTML
 */
export function card(inner: string): string {
  return `<article class="match-card">${inner}${PAD}</article>`;
}

export function page(...cards: string[]): string {
  return `<!doctype html>\n<html><body><main>${cards.join('\n')}</main></body></html>`;
}
