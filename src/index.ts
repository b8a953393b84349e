/**
 * Matchday Scraper - Main Entry Point
 *
 * Polls a team's schedule page, reconciles the parsed matches with the cache
 * persisted in Redis, and publishes upcoming/live/finished snapshots to Kafka.
 */

import { logger } from './core/logger.js';
import { startApp } from './services/app.js';

// Start the service and handle any uncaught errors
startApp().catch((err) => {
  logger.error({ err }, 'Fatal error occurred');
  process.exit(1);
});
