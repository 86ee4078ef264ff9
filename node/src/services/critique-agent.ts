// node/src/services/critique-agent.ts — reading the evaluator stage's critique

const SCORE_LINE = /SCORE:\s*([0-9]+(?:\.[0-9]+)?)/gi;

/**
 * Numeric score from the critique's `SCORE: x.y` line, clamped to 0–10.
 * When the model repeats the line, the last one wins. Null when absent.
 */
export function extractCritiqueScore(critique: string): number | null {
  let last: string | null = null;
  for (const match of critique.matchAll(SCORE_LINE)) {
    last = match[1];
  }
  if (last === null) return null;
  const score = Number.parseFloat(last);
  if (!Number.isFinite(score)) return null;
  return Math.min(10, Math.max(0, score));
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}
