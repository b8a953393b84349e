/**
 * Start Time Parser
 *
 * The schedule prints start times without a year, e.g. "PN, 01-30, 21:30"
 * (weekday code, month-day, hour:minute in local time). The year is inferred
 * from the current instant so a season crossing New Year resolves correctly.
 */

import { YEAR_INFERENCE } from '../core/constants.js';
import { firstMatch, type Matcher } from './strategy.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Month/day/time read from the page, before a year is chosen
 */
export interface StartParts {
  month: number;
  day: number;
  hour: number;
  minute: number;
}

// Weekday code starts upper-case: "PN", "Š", "Tue"
const WEEKDAY_RE = /(\p{Lu}\p{L}{0,2})\s*,\s*(\d{2})-(\d{2})\s*,\s*(\d{2}):(\d{2})/u;
// Weekday sometimes preceded by a stray nbsp or missing entirely
const BARE_RE = /\b(\d{2})-(\d{2})\s*,\s*(\d{2}):(\d{2})\b/;

function toParts(month: string, day: string, hour: string, minute: string): StartParts | null {
  const parts = { month: Number(month), day: Number(day), hour: Number(hour), minute: Number(minute) };
  if (parts.month < 1 || parts.month > 12) return null;
  if (parts.day < 1 || parts.day > 31) return null;
  if (parts.hour > 23 || parts.minute > 59) return null;
  return parts;
}

const START_MATCHERS: readonly Matcher<StartParts>[] = [
  (text) => {
    const m = WEEKDAY_RE.exec(text);
    return m ? toParts(m[2], m[3], m[4], m[5]) : null;
  },
  (text) => {
    const m = BARE_RE.exec(text);
    return m ? toParts(m[1], m[2], m[3], m[4]) : null;
  },
];

/**
 * Builds a local date, or null when the day does not exist in that year
 */
function localDate(year: number, p: StartParts): Date | null {
  const d = new Date(year, p.month - 1, p.day, p.hour, p.minute, 0, 0);
  if (d.getMonth() !== p.month - 1 || d.getDate() !== p.day) return null;
  return d;
}

/**
 * Resolves month/day/time into an absolute instant
 *
 * - Start in the current year.
 * - More than 180 days in the past: next year.
 * - More than 330 days in the future while the month is before the current
 *   month: previous year.
 *
 * @example
 * // now = 2025-07-31
 * guessStart({ month: 1, day: 30, hour: 19, minute: 0 }, now) // 2026-01-30 19:00 local
 */
export function guessStart(parts: StartParts, now: Date): Date | null {
  const year = now.getFullYear();
  let start = localDate(year, parts);
  if (!start) return null;

  if (start.getTime() < now.getTime() - YEAR_INFERENCE.ROLL_FORWARD_DAYS * DAY_MS) {
    start = localDate(year + 1, parts);
  }
  if (
    start &&
    start.getTime() > now.getTime() + YEAR_INFERENCE.ROLL_BACK_DAYS * DAY_MS &&
    parts.month < now.getMonth() + 1
  ) {
    start = localDate(year - 1, parts);
  }
  return start;
}

/**
 * Finds the first start-time token in a window and resolves it
 */
export function parseStart(window: string, now: Date = new Date()): Date | null {
  const parts = firstMatch(START_MATCHERS, window);
  return parts ? guessStart(parts, now) : null;
}
