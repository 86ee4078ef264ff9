// node/src/services/retrieval-vector-utils.ts — shared vector + token helpers for retrieval and metrics
import stopwordList from '../data/stopwords.json';

export type Embedding = number[];

export interface Embedder {
  embed(text: string): Promise<Embedding>;
}

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

export function cosineSimilarity(a: Embedding, b: Embedding): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/gu)
    .filter(Boolean);
}

/** Tokens that carry content: stop words and single characters dropped. */
export function contentTokens(text: string): string[] {
  return tokenize(text).filter((t) => t.length > 1 && !STOPWORDS.has(t));
}

/** Sentence split on terminal punctuation or line breaks; fragments without tokens are dropped. */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/g)
    .map((s) => s.trim())
    .filter((s) => tokenize(s).length > 0);
}

export function clampUnit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function roundScore(value: number, digits = 4): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}
