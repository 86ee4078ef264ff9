// node/src/views/run-view.ts — JSON shape returned by POST /api/run
import type { PipelineRun, StageFailure } from '../types/core';
import type { MetricRow } from './metric-table';
import { toMetricRows } from './metric-table';

export interface PipelineRunView {
  status: PipelineRun['status'];
  query: string;
  mode: PipelineRun['mode'];
  finalAnswer: string | null;
  groundedAnswer: string | null;
  evaluatorScore: number | null;
  answerWordCount: number | null;
  stages: Array<{ stage: string; backend: string; fellBack: boolean; elapsedMs: number; text: string }>;
  chunks: Array<{ rank: number; score: number; source: string; text: string }>;
  ragTimeMs: number | null;
  totalTimeMs: number;
  metrics: PipelineRun['metrics'];
  metricTable: MetricRow[];
  failedStage: string | null;
  error: StageFailure | null;
  retrievalError: StageFailure | null;
}

export function toRunView(run: PipelineRun): PipelineRunView {
  const completed = run.status === 'completed' ? run : null;
  const failed = run.status === 'failed' ? run : null;
  return {
    status: run.status,
    query: run.query,
    mode: run.mode,
    finalAnswer: completed?.finalAnswer ?? null,
    groundedAnswer: run.groundedAnswer ?? null,
    evaluatorScore: completed?.evaluatorScore ?? null,
    answerWordCount: completed?.answerWordCount ?? null,
    stages: run.stageResults.map((r) => ({
      stage: r.stage,
      backend: r.backend,
      fellBack: r.fellBack,
      elapsedMs: r.elapsedMs,
      text: r.text,
    })),
    chunks: run.chunks.map((c) => ({ rank: c.rank, score: c.score, source: c.source, text: c.text })),
    ragTimeMs: run.ragTimeMs ?? null,
    totalTimeMs: run.totalTimeMs,
    metrics: run.metrics,
    metricTable: toMetricRows(run.metrics),
    failedStage: failed?.failedStage ?? null,
    error: failed?.error ?? null,
    retrievalError: run.retrievalError ?? null,
  };
}
