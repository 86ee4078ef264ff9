// node/src/services/pipeline-errors.ts — error kinds raised by retrieval and generation
import type { BackendKind, StageFailure, StageName } from '../types/core';

export type PipelineErrorCode = 'BACKEND_UNAVAILABLE' | 'QUOTA_EXCEEDED' | 'RETRIEVAL_FAILURE';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  readonly backend?: BackendKind;
  stage?: StageName;

  constructor(message: string, options?: { backend?: BackendKind; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.backend = options?.backend;
  }

  toJSON(): StageFailure {
    return {
      code: this.code,
      message: this.message,
      ...(this.backend ? { backend: this.backend } : {}),
    };
  }
}

/** Generation service not reachable, timed out, or returned nothing usable. */
export class BackendUnavailableError extends PipelineError {
  readonly code = 'BACKEND_UNAVAILABLE' as const;

  constructor(backend: BackendKind, message: string, cause?: unknown) {
    super(message, { backend, cause });
  }
}

/** Cloud backend rejected the request for quota or rate reasons. */
export class QuotaExceededError extends PipelineError {
  readonly code = 'QUOTA_EXCEEDED' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { backend: 'cloud', cause });
  }
}

export class RetrievalFailureError extends PipelineError {
  readonly code = 'RETRIEVAL_FAILURE' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/** Normalizes anything thrown by a stage into the failure shape reported to callers. */
export function toStageFailure(error: unknown): StageFailure {
  if (isPipelineError(error)) return error.toJSON();
  return {
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : String(error),
  };
}
