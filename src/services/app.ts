/**
 * Application Service
 *
 * Main application orchestration logic.
 * Handles initialization, the polling loop, and graceful shutdown.
 */

import { cfg, readSettings } from '../core/config.js';
import { logger } from '../core/logger.js';
import { publishSnapshot, startProducer, stopProducer } from '../bus/kafkaProducer.js';
import { MatchCache } from '../cache/matchCache.js';
import { RedisMatchStore } from '../cache/matchStore.js';
import { closeRedis, redis } from '../cache/redisClient.js';
import { ConditionalFetcher } from '../http/conditionalFetcher.js';
import { waitForServices } from '../util/waitForServices.js';
import { PollScheduler } from './pollScheduler.js';
import { SnapshotPublisher } from './snapshotPublisher.js';
import { UpdateCycle } from './updateCycle.js';

/**
 * Sets up graceful shutdown handlers
 *
 * @param scheduler - Poll scheduler to stop; an in-flight cycle is allowed to finish
 */
function setupShutdownHandlers(scheduler: PollScheduler): void {
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    await scheduler.stop();

    if (cfg.kafka.enabled) {
      try {
        await stopProducer();
      } catch (err) {
        logger.warn({ err }, 'Error stopping Kafka producer');
      }
    }

    try {
      await closeRedis();
    } catch (err) {
      logger.warn({ err }, 'Error closing Redis connection');
    }

    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

/**
 * Main application logic
 *
 * Initializes the service by:
 * 1. Waiting for Redis (and Kafka when enabled)
 * 2. Loading the persisted match cache
 * 3. Connecting the Kafka producer when enabled
 * 4. Starting the polling loop and shutdown handlers
 */
export async function startApp(): Promise<PollScheduler> {
  // Wait for all services to be ready before starting
  await waitForServices();

  const store = new RedisMatchStore(redis);
  const cache = new MatchCache();
  await cache.load(store);

  if (cfg.kafka.enabled) await startProducer();
  const publisher = cfg.kafka.enabled ? new SnapshotPublisher(publishSnapshot, redis) : null;

  const cycle = new UpdateCycle({
    fetcher: new ConditionalFetcher(),
    cache,
    store,
    settings: readSettings
  });

  const scheduler = new PollScheduler({
    cycle,
    settings: readSettings,
    onSnapshot: publisher ? async (snapshot) => { await publisher.publish(snapshot); } : undefined
  });

  setupShutdownHandlers(scheduler);

  const settings = readSettings();
  logger.info({ baseUrl: cfg.site.baseUrl, ...settings, cachedMatches: cache.size }, 'starting schedule polling');
  scheduler.start();
  return scheduler;
}
