/**
 * Update Cycle
 *
 * One pass of the scraper:
 * FETCH_SCHEDULE → PARSE_SCHEDULE → MERGE_SCHEDULE_MATCHES → CLASSIFY →
 * SELECT_DETAIL_TARGETS → FETCH_DETAILS → MERGE_DETAILS → RECLASSIFY →
 * PERSIST → EMIT_SNAPSHOT
 *
 * Only a failed schedule fetch fails the cycle. Detail fetch and storage
 * failures are logged and the snapshot is built from whatever the cache holds.
 */

import type { SettingsProvider } from '../core/config.js';
import { WINDOW } from '../core/constants.js';
import { logger } from '../core/logger.js';
import type { MatchCache } from '../cache/matchCache.js';
import type { MatchStore } from '../cache/matchStore.js';
import type { PageFetcher } from '../http/conditionalFetcher.js';
import { scheduleUrl } from '../http/siteClient.js';
import { parseMatchWindow, type MatchParseOptions } from '../parsers/matchParser.js';
import { parseSchedule } from '../parsers/scheduleParser.js';
import { extractWindow } from '../parsers/windowExtractor.js';
import type { MatchRecord, Snapshot } from '../types/match.js';
import { nextIntervalSeconds } from '../util/pollInterval.js';
import { classify, lastFinishedWithScore, selectDetailTargets } from './classifier.js';

export interface UpdateCycleDeps {
  fetcher: PageFetcher;
  cache: MatchCache;
  store: MatchStore;
  settings: SettingsProvider;
  /** Defaults to the system clock */
  clock?: () => Date;
  parseOptions?: Omit<MatchParseOptions, 'now'>;
}

export interface CycleResult {
  snapshot: Snapshot;
  /** Delay before the next cycle; shortened while a match is live */
  nextIntervalSeconds: number;
}

export class UpdateCycle {
  private readonly clock: () => Date;

  constructor(private readonly deps: UpdateCycleDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Runs one cycle
   *
   * @throws FetchError when the schedule page cannot be fetched
   */
  async run(): Promise<CycleResult> {
    const { fetcher, cache, store } = this.deps;
    const settings = this.deps.settings();
    const now = this.clock();
    const sourceUrl = scheduleUrl(settings.teamPath);
    const parseOptions: MatchParseOptions = { ...this.deps.parseOptions, now };

    const html = await fetcher.fetch(sourceUrl);

    const { gameIds, debug } = parseSchedule(html);
    if (gameIds.length === 0) {
      logger.warn({ sourceUrl, htmlHead: debug.html_head }, 'no matches found on schedule page');
    }

    for (const gameId of gameIds) {
      cache.applySchedule(parseMatchWindow(gameId, extractWindow(html, gameId), parseOptions));
    }

    let classification = classify(cache.values(), now);
    const targets = selectDetailTargets(classification, now);

    let detailFailures = 0;
    if (targets.length > 0) {
      detailFailures = await this.fetchDetails(targets, parseOptions);
      classification = classify(cache.values(), now);
    }

    const pruned = cache.prune(now, settings.retentionDays);
    if (pruned > 0) classification = classify(cache.values(), now);
    await cache.save(store, now);

    const snapshot: Snapshot = {
      team_path: settings.teamPath,
      source_url: sourceUrl,
      fetched_at: now.toISOString(),
      live: classification.live,
      upcoming: classification.upcoming,
      finished: classification.finished,
      last_finished_with_score: lastFinishedWithScore(classification.finished),
      debug: {
        ...debug,
        detail_targets: targets.map(t => t.game_id),
        detail_failures: detailFailures,
        cache_size: cache.size,
      },
    };

    logger.info({
      teamPath: settings.teamPath,
      matches: gameIds.length,
      upcoming: snapshot.upcoming.length,
      finished: snapshot.finished.length,
      live: snapshot.live?.game_id ?? null,
      detailTargets: targets.length,
      pruned
    }, 'update cycle complete');

    return {
      snapshot,
      nextIntervalSeconds: nextIntervalSeconds(settings, classification.live !== null),
    };
  }

  /**
   * Fetches detail pages concurrently and merges what they yield. A failing
   * page never affects the others.
   *
   * @returns Number of failed detail fetches
   */
  private async fetchDetails(targets: MatchRecord[], parseOptions: MatchParseOptions): Promise<number> {
    const { fetcher, cache } = this.deps;

    const results = await Promise.allSettled(targets.map(async (target) => {
      const html = await fetcher.fetch(target.info_url);
      const window = html.slice(0, WINDOW.DETAIL_PAGE_CHARS);
      cache.applyDetail(parseMatchWindow(target.game_id, window, parseOptions));
    }));

    let failures = 0;
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        failures++;
        logger.warn({ err: result.reason, gameId: targets[i].game_id, url: targets[i].info_url }, 'match detail update failed');
      }
    });
    return failures;
  }
}
