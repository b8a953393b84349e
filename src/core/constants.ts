/**
 * Application Constants
 *
 * Centralized location for all magic numbers and configuration constants.
 */

/**
 * Source site defaults
 */
export const SITE = {
  BASE_URL: 'https://club.example.org',

  /** Schedule listing path used when none is configured */
  DEFAULT_TEAM_PATH: '/schedule',

  /** Path segment that precedes a match identifier in every detail link */
  ITEM_PATH: '/schedule-item/',

  /** Alt text of the club's own placeholder badge */
  CLUB_BADGE_ALT: 'Club team',

  TICKET_HOSTS: ['koobin.com'],
} as const;

/**
 * Allowed ranges for per-cycle settings
 */
export const SETTINGS_BOUNDS = {
  POLL_INTERVAL_SECONDS: { MIN: 60, MAX: 3600, DEFAULT: 600 },
  LIVE_POLL_INTERVAL_SECONDS: { MIN: 5, MAX: 120, DEFAULT: 20 },
  RETENTION_DAYS: { MIN: 1, MAX: 365, DEFAULT: 60 },
} as const;

/**
 * HTTP fetch limits
 */
export const FETCH = {
  /** Hard ceiling for a single request, redirects included */
  TIMEOUT_MS: 15000,
} as const;

/**
 * Match window sizes (in characters)
 */
export const WINDOW = {
  /** Fixed window centred on the anchor occurrence */
  DEFAULT_SIZE: 6000,

  /** A card span is preferred only when its length falls in this range */
  MIN_CARD_LENGTH: 800,
  MAX_CARD_LENGTH: 50000,

  /** Markup delimiting one match card on the schedule page */
  CARD_OPEN: '<article',
  CARD_CLOSE: '</article>',

  /** Query parameter carried by the most reliable match anchors */
  TAB_QUERY: '?tab=',

  /** Detail pages are parsed from their head only */
  DETAIL_PAGE_CHARS: 12000,
} as const;

/**
 * Classification and detail-fetch windows (in hours)
 */
export const CLASSIFY = {
  /** An unscored match stays in `finished` this long after its start */
  RECENT_UNSCORED_HOURS: 6,

  /** Finished matches started within this window may get a detail fetch */
  DETAIL_LOOKBACK_HOURS: 24,

  /** Only this many of the most recent finished matches are considered */
  DETAIL_CANDIDATES: 3,

  /** Upper bound on concurrent detail fetches per cycle */
  MAX_DETAIL_TARGETS: 2,
} as const;

/**
 * Start-time year inference thresholds (in days)
 */
export const YEAR_INFERENCE = {
  ROLL_FORWARD_DAYS: 180,
  ROLL_BACK_DAYS: 330,
} as const;

/**
 * Persisted state layout
 */
export const STORAGE = {
  KEY: 'matchday:state',
  VERSION: 1,
} as const;

/**
 * Service health check configuration
 */
export const HEALTH_CHECK = {
  /** Maximum retries for service health checks */
  MAX_RETRIES: 30,

  /** Delay between retries (2 seconds) */
  RETRY_DELAY_MS: 2000,

  /** Connection timeout for health checks (1 second) */
  CONNECTION_TIMEOUT_MS: 1000,
} as const;
