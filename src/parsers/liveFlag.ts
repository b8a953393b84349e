/**
 * Live Flag Parser
 *
 * Best-effort: any live/broadcast indicator word in the window flags the match.
 * Pre-game promo text mentioning a live stream is flagged too.
 */

export const LIVE_WORDS = ['live', 'gyvai', 'tiesiogiai'] as const;

export function parseLiveFlag(window: string): boolean {
  const lower = window.toLowerCase();
  return LIVE_WORDS.some(word => lower.includes(word));
}
