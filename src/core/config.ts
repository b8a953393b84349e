/**
 * Configuration Module
 *
 * Centralizes all application configuration from environment variables.
 * Values from the real environment take precedence over the .env file.
 *
 * Static settings (site, Redis, Kafka, logging) are read once at startup.
 * Cycle settings (team path, intervals, retention) are re-read at the start of
 * every update cycle through `readSettings()`.
 */

import dotenv from 'dotenv';
import { SETTINGS_BOUNDS, SITE } from './constants.js';

// The real process environment, captured before .env is applied
const processEnv: NodeJS.ProcessEnv = { ...process.env };

dotenv.config();

/**
 * Splits a comma-separated environment value into trimmed, non-empty parts
 */
function list(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  const parts = value.split(',').map(p => p.trim()).filter(Boolean);
  return parts.length > 0 ? parts : fallback;
}

/**
 * Application configuration object
 *
 * All configuration values are read from environment variables with sensible defaults.
 */
export const cfg = {
  // Source site configuration
  site: {
    baseUrl: process.env.SITE_BASE_URL || SITE.BASE_URL, // Origin the team path and detail links resolve against
    userAgent: process.env.USER_AGENT || 'matchday-scraper/1.0',
    clubBadgeAlt: process.env.CLUB_BADGE_ALT || SITE.CLUB_BADGE_ALT, // Alt text of the club's own generic badge (never a team name)
    ticketHosts: list(process.env.TICKET_HOSTS, [...SITE.TICKET_HOSTS])
  },
  // Redis configuration
  redis: {
    url: process.env.REDIS_URL || 'redis://localhost:6379' // Redis connection URL
  },
  // Kafka/Redpanda configuration
  kafka: {
    enabled: process.env.KAFKA_ENABLED === 'true',
    brokers: list(process.env.KAFKA_BROKERS, ['localhost:9092']), // Comma-separated list of Kafka broker addresses
    clientId: process.env.KAFKA_CLIENT_ID || 'matchday-scraper', // Client identifier for Kafka connections
    topicSnapshots: process.env.KAFKA_TOPIC_SNAPSHOTS || 'matchday.snapshots' // Topic name for publishing snapshots
  },
  // Logging configuration
  logLevel: process.env.LOG_LEVEL || 'info' // Log level (trace, debug, info, warn, error, fatal)
};

/**
 * Settings consumed at the start of each update cycle
 */
export interface Settings {
  teamPath: string;
  pollIntervalSeconds: number;
  livePollIntervalSeconds: number;
  retentionDays: number;
}

/**
 * Returns a settings snapshot; the orchestrator calls it once per cycle
 */
export type SettingsProvider = () => Settings;

/**
 * Ensures a team path starts with a single leading slash
 *
 * @example
 * normalizeTeamPath('schedule') // '/schedule'
 * normalizeTeamPath('  /team/schedule ') // '/team/schedule'
 */
export function normalizeTeamPath(path: string | undefined): string {
  const trimmed = (path || '').trim() || SITE.DEFAULT_TEAM_PATH;
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

/**
 * Parses an integer setting and clamps it into its allowed range.
 * Non-numeric values fall back to the default.
 */
function boundedInt(value: string | undefined, bounds: { MIN: number; MAX: number; DEFAULT: number }): number {
  const n = Number.parseInt(value ?? '', 10);
  if (!Number.isFinite(n)) return bounds.DEFAULT;
  return Math.min(bounds.MAX, Math.max(bounds.MIN, n));
}

/**
 * Builds cycle settings from an environment map
 *
 * @param env - Environment variables (defaults to process.env)
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    teamPath: normalizeTeamPath(env.TEAM_PATH),
    pollIntervalSeconds: boundedInt(env.POLL_INTERVAL_SECONDS, SETTINGS_BOUNDS.POLL_INTERVAL_SECONDS),
    livePollIntervalSeconds: boundedInt(env.LIVE_POLL_INTERVAL_SECONDS, SETTINGS_BOUNDS.LIVE_POLL_INTERVAL_SECONDS),
    retentionDays: boundedInt(env.RETENTION_DAYS, SETTINGS_BOUNDS.RETENTION_DAYS)
  };
}

export interface SettingsReaderOptions {
  /** .env file to re-read (defaults to .env in the working directory) */
  path?: string;
  /** Real environment; its values win over the file */
  env?: NodeJS.ProcessEnv;
}

/**
 * Builds a provider that re-parses the .env file on every call
 *
 * The file is parsed into a fresh map rather than into process.env, so a key
 * removed from the file stops applying on the next read and never shadows a
 * variable set by the real environment.
 */
export function settingsReader(options: SettingsReaderOptions = {}): SettingsProvider {
  const env = options.env ?? processEnv;
  return () => {
    const fromFile: Record<string, string> = {};
    dotenv.config({ path: options.path, processEnv: fromFile });
    return loadSettings({ ...fromFile, ...env });
  };
}

/**
 * Fresh cycle settings from the real environment and the current .env.
 * Lets an operator change intervals or the team path without a restart.
 */
export const readSettings: SettingsProvider = settingsReader();
