export const MAX_RELEVANCE_SCORE = 10;

/**
 * Read a 0-10 relevance score from a completion. Returns null when the text
 * holds no number; out-of-range values are clamped.
 */
export function parseRelevanceScore(raw: string): number | null {
  const match = raw.match(/-?\d+(?:\.\d+)?/);
  if (!match) return null;

  const value = Number(match[0]);
  if (!Number.isFinite(value)) return null;
  return Math.min(MAX_RELEVANCE_SCORE, Math.max(0, value));
}
