/**
 * Redis Client Module
 *
 * Creates and exports a singleton Redis client instance.
 * Handles connection events and errors for monitoring.
 */

import { Redis } from 'ioredis';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';

/**
 * The subset of a Redis client the stores rely on.
 * Tests substitute an in-process map behind the same shape.
 */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

/**
 * Redis client instance
 *
 * Connects to Redis using the URL from configuration.
 * Used for:
 * - The persisted match state document
 * - Hashes of published snapshots
 */
export const redis = new Redis(cfg.redis.url);

// Log connection events for monitoring
redis.on('connect', () => logger.info('Redis connected'));
redis.on('error', (err) => logger.error({ err }, 'Redis error'));

/**
 * Closes the Redis connection gracefully
 */
export async function closeRedis(): Promise<void> {
  await redis.quit();
  logger.info('Redis connection closed');
}
