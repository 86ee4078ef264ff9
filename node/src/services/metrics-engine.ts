// node/src/services/metrics-engine.ts — per-run quality and latency metrics
//
// Each metric is computed independently from the run's artifacts. A metric whose
// input is missing (no chunks, no final answer, fewer than three stages) is reported
// as notApplicable; the report always carries all nine keys.

import type { Chunk, MetricName, MetricReport, MetricValue, StageResult } from '../types/core';
import type { Embedder, Embedding } from './retrieval-vector-utils';
import { clampUnit, contentTokens, cosineSimilarity, roundScore, splitSentences } from './retrieval-vector-utils';

export interface MetricsInput {
  query: string;
  chunks?: Chunk[];
  stageResults: StageResult[];
  ragTimeMs?: number;
}

/** An answer sentence counts as grounded when its best chunk similarity reaches this. */
export const GROUNDED_SENTENCE_THRESHOLD = 0.5;

export const METRIC_LABELS: Record<MetricName, string> = {
  precision: 'Precision Score',
  recall: 'Recall Score',
  alignment: 'Answer–Document Alignment',
  coherence: 'Coherence Score',
  groundedness: 'Groundedness Score',
  novelty: 'Novelty Score',
  ragTime: 'RAG Time',
  generationTime: 'Generation Time',
  totalTime: 'Total Time',
};

const NO_CHUNKS = 'no grounding documents';
const NO_ANSWER = 'no final answer';

export function sumStageTimes(stageResults: StageResult[]): number {
  return stageResults.reduce((sum, r) => sum + r.elapsedMs, 0);
}

/** Retrieval time (0 when skipped) plus every stage's generation time. */
export function totalRunTime(ragTimeMs: number | undefined, stageResults: StageResult[]): number {
  return (ragTimeMs ?? 0) + sumStageTimes(stageResults);
}

function score(value: number): MetricValue {
  return { kind: 'computed', value: roundScore(clampUnit(value)), unit: 'score' };
}

function duration(ms: number): MetricValue {
  return { kind: 'computed', value: ms, unit: 'ms' };
}

function notApplicable(reason: string): MetricValue {
  return { kind: 'notApplicable', reason };
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((s, v) => s + v, 0) / values.length;
}

export class MetricsEngine {
  constructor(private readonly embedder: Embedder) {}

  async evaluate(input: MetricsInput): Promise<MetricReport> {
    const cache = new Map<string, Promise<Embedding>>();
    const embed = (text: string): Promise<Embedding> => {
      let hit = cache.get(text);
      if (!hit) {
        hit = this.embedder.embed(text);
        cache.set(text, hit);
      }
      return hit;
    };

    const byStage = new Map(input.stageResults.map((r) => [r.stage, r.text]));
    const finalAnswer = byStage.get('improver');
    const chunks = input.chunks && input.chunks.length > 0 ? input.chunks : null;
    const generationTime = sumStageTimes(input.stageResults);

    const precision = finalAnswer !== undefined
      ? score(cosineSimilarity(await embed(input.query), await embed(finalAnswer)))
      : notApplicable(NO_ANSWER);

    const recall = !chunks
      ? notApplicable(NO_CHUNKS)
      : finalAnswer === undefined
        ? notApplicable(NO_ANSWER)
        : score(tokenCoverage(chunks.map((c) => c.text).join(' '), finalAnswer));

    const alignment = !chunks
      ? notApplicable(NO_CHUNKS)
      : finalAnswer === undefined
        ? notApplicable(NO_ANSWER)
        : score(cosineSimilarity(await embed(finalAnswer), await embed(chunks.map((c) => c.text).join('\n\n'))));

    const coherence = finalAnswer !== undefined
      ? score(await adjacentSentenceSimilarity(finalAnswer, embed))
      : notApplicable(NO_ANSWER);

    const groundedness = !chunks
      ? notApplicable(NO_CHUNKS)
      : finalAnswer === undefined
        ? notApplicable(NO_ANSWER)
        : score(await groundedSentenceShare(finalAnswer, chunks, embed));

    const solver = byStage.get('solver');
    const evaluator = byStage.get('evaluator');
    const novelty =
      solver !== undefined && evaluator !== undefined && finalAnswer !== undefined
        ? score(await nonRedundancy([solver, evaluator, finalAnswer], embed))
        : notApplicable('not all stages completed');

    return {
      precision,
      recall,
      alignment,
      coherence,
      groundedness,
      novelty,
      ragTime: input.ragTimeMs !== undefined ? duration(input.ragTimeMs) : notApplicable(NO_CHUNKS),
      generationTime: duration(generationTime),
      totalTime: duration(totalRunTime(input.ragTimeMs, input.stageResults)),
    };
  }
}

/** Share of distinct content tokens of `source` that also occur in `answer`. */
export function tokenCoverage(source: string, answer: string): number {
  const sourceTokens = new Set(contentTokens(source));
  if (sourceTokens.size === 0) return 0;
  const answerTokens = new Set(contentTokens(answer));
  let covered = 0;
  for (const t of sourceTokens) {
    if (answerTokens.has(t)) covered++;
  }
  return covered / sourceTokens.size;
}

async function adjacentSentenceSimilarity(
  text: string,
  embed: (text: string) => Promise<Embedding>,
): Promise<number> {
  const sentences = splitSentences(text);
  if (sentences.length < 2) return 1;
  const embeddings = await Promise.all(sentences.map(embed));
  const sims: number[] = [];
  for (let i = 1; i < embeddings.length; i++) {
    sims.push(cosineSimilarity(embeddings[i - 1], embeddings[i]));
  }
  return mean(sims);
}

async function groundedSentenceShare(
  answer: string,
  chunks: Chunk[],
  embed: (text: string) => Promise<Embedding>,
): Promise<number> {
  const sentences = splitSentences(answer);
  if (sentences.length === 0) return 0;
  const chunkEmbeddings = await Promise.all(chunks.map((c) => embed(c.text)));
  let grounded = 0;
  for (const sentence of sentences) {
    const emb = await embed(sentence);
    const best = Math.max(...chunkEmbeddings.map((c) => cosineSimilarity(emb, c)));
    if (best >= GROUNDED_SENTENCE_THRESHOLD) grounded++;
  }
  return grounded / sentences.length;
}

async function nonRedundancy(
  texts: string[],
  embed: (text: string) => Promise<Embedding>,
): Promise<number> {
  const embeddings = await Promise.all(texts.map(embed));
  const sims: number[] = [];
  for (let i = 0; i < embeddings.length; i++) {
    for (let j = i + 1; j < embeddings.length; j++) {
      sims.push(cosineSimilarity(embeddings[i], embeddings[j]));
    }
  }
  return 1 - mean(sims);
}
