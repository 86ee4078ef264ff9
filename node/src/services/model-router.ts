// node/src/services/model-router.ts — routes each reasoning stage to a generation backend

import type { BackendKind, StageName, StageResult } from '../types/core';
import type { Clock } from '../utils/clock';
import { systemClock } from '../utils/clock';
import { logger } from './logger';
import { BackendUnavailableError, QuotaExceededError, isPipelineError } from './pipeline-errors';

export interface GenerationRequest {
  system: string;
  prompt: string;
  maxTokens?: number;
  temperature?: number;
}

export interface GenerationBackend {
  readonly kind: BackendKind;
  generate(request: GenerationRequest): Promise<string>;
}

/** Only these cloud failures are worth one retry on the local model. */
function isRecoverableCloudFailure(error: unknown): boolean {
  return error instanceof QuotaExceededError || error instanceof BackendUnavailableError;
}

export class StageRouter {
  private readonly primary: GenerationBackend;
  private readonly local: GenerationBackend | null;
  private readonly clock: Clock;

  constructor(primary: GenerationBackend, local: GenerationBackend | null, clock: Clock = systemClock) {
    this.primary = primary;
    this.local = local;
    this.clock = clock;
  }

  get primaryKind(): BackendKind {
    return this.primary.kind;
  }

  /** Backend used for document-only answers; null when none is configured. */
  get localBackend(): GenerationBackend | null {
    return this.primary.kind === 'local' ? this.primary : this.local;
  }

  /**
   * Run one stage. A recoverable cloud failure is retried exactly once on the
   * local backend; anything else propagates with the stage attached.
   */
  async generate(stage: StageName, request: GenerationRequest): Promise<StageResult> {
    const start = this.clock();
    let backend: GenerationBackend = this.primary;
    let fellBack = false;
    let text: string;

    try {
      text = await this.primary.generate(request);
    } catch (error) {
      const fallback = this.local;
      if (this.primary.kind !== 'cloud' || !fallback || fallback === this.primary || !isRecoverableCloudFailure(error)) {
        throw tagStage(error, stage);
      }
      logger.warn('stage:fallback', {
        stage,
        from: this.primary.kind,
        to: fallback.kind,
        reason: error instanceof Error ? error.message : String(error),
      });
      backend = fallback;
      fellBack = true;
      try {
        text = await fallback.generate(request);
      } catch (fallbackError) {
        throw tagStage(fallbackError, stage);
      }
    }

    const elapsedMs = this.clock() - start;
    logger.info('stage:done', { stage, backend: backend.kind, fellBack, elapsedMs, length: text.length });
    return Object.freeze({
      stage,
      text,
      elapsedMs,
      backend: backend.kind,
      prompt: request.prompt,
      fellBack,
    });
  }

  /** Single call on a given backend, no fallback; used outside the stage chain. */
  async generateOn(backend: GenerationBackend, request: GenerationRequest): Promise<TimedGeneration> {
    const start = this.clock();
    const text = await backend.generate(request);
    return { text, elapsedMs: this.clock() - start };
  }
}

export interface TimedGeneration {
  text: string;
  elapsedMs: number;
}

function tagStage(error: unknown, stage: StageName): unknown {
  if (isPipelineError(error)) {
    error.stage = stage;
  }
  return error;
}
