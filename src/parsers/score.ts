/**
 * Score Parser
 *
 * Scores are rendered in tabular-number paragraphs. The same numbers often
 * appear twice (plain HTML and the escaped JSON payload), so repeated tokens
 * are dropped before counting.
 */

export interface Score {
  score_home: number | null;
  score_away: number | null;
}

const SCORE_SOURCES: readonly RegExp[] = [
  /tabular-nums[^>]*>\s*([^<]{1,3})\s*<\/p>/gi,
  /tabular-nums\\",\\"children\\":\\"([^\\"]{1,3})/gi,
];

const NO_SCORE: Score = { score_home: null, score_away: null };

/**
 * Reads the first two numeric score tokens. Anything short of two numbers
 * means the match has no score yet.
 */
export function parseScore(window: string): Score {
  const tokens: string[] = [];
  for (const pattern of SCORE_SOURCES) {
    for (const m of window.matchAll(pattern)) {
      const token = m[1].replace(/\u00a0/g, ' ').trim();
      if (!tokens.includes(token)) tokens.push(token);
    }
  }

  const numbers = tokens.filter(t => /^\d+$/.test(t)).slice(0, 2).map(Number);
  if (numbers.length < 2) return { ...NO_SCORE };
  return { score_home: numbers[0], score_away: numbers[1] };
}
