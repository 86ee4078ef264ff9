// node/src/types/core.ts
export type ReasoningMode = 'engineering' | 'research' | 'policy';

export const REASONING_MODES: readonly ReasoningMode[] = ['engineering', 'research', 'policy'];

export type BackendKind = 'cloud' | 'local';

export type StageName = 'solver' | 'evaluator' | 'improver';

/** One uploaded file as received by the route; content is the raw bytes. */
export interface SourceDocument {
  fileName: string;
  mimeType: string;
  content: Buffer;
}

/** A retrieved fragment of document text. rank is 1-based, highest score first. */
export interface Chunk {
  id: string;
  text: string;
  rank: number;
  score: number;
  source: string;
}

export interface RetrievalResult {
  chunks: Chunk[];
  elapsedMs: number;
}

export interface StageResult {
  readonly stage: StageName;
  readonly text: string;
  readonly elapsedMs: number;
  /** Backend that actually produced the text. */
  readonly backend: BackendKind;
  readonly prompt: string;
  /** True when the primary cloud call failed and the local backend answered instead. */
  readonly fellBack: boolean;
}

export type MetricName =
  | 'precision'
  | 'recall'
  | 'alignment'
  | 'coherence'
  | 'groundedness'
  | 'novelty'
  | 'ragTime'
  | 'generationTime'
  | 'totalTime';

export const METRIC_NAMES: readonly MetricName[] = [
  'precision',
  'recall',
  'alignment',
  'coherence',
  'groundedness',
  'novelty',
  'ragTime',
  'generationTime',
  'totalTime',
];

export type MetricUnit = 'score' | 'ms';

export type MetricValue =
  | { kind: 'computed'; value: number; unit: MetricUnit }
  | { kind: 'notApplicable'; reason: string };

export type MetricReport = Record<MetricName, MetricValue>;

export interface RunRequest {
  query: string;
  mode: ReasoningMode;
  documents: SourceDocument[];
}

export interface StageFailure {
  code: string;
  message: string;
  backend?: BackendKind;
}

interface PipelineRunBase {
  query: string;
  mode: ReasoningMode;
  stageResults: StageResult[];
  chunks: Chunk[];
  /** Undefined when retrieval was skipped or failed. */
  ragTimeMs?: number;
  totalTimeMs: number;
  metrics: MetricReport;
  /** Set when documents were supplied but retrieval failed and the run went ungrounded. */
  retrievalError?: StageFailure;
}

export interface CompletedRun extends PipelineRunBase {
  status: 'completed';
  finalAnswer: string;
  groundedAnswer?: string;
  /** Parsed from the evaluator's SCORE line, 0–10; null when the line is missing. */
  evaluatorScore: number | null;
  answerWordCount: number;
}

export interface FailedRun extends PipelineRunBase {
  status: 'failed';
  failedStage: StageName;
  error: StageFailure;
  groundedAnswer?: string;
}

export type PipelineRun = CompletedRun | FailedRun;
