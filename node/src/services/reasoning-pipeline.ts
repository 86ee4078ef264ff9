// node/src/services/reasoning-pipeline.ts — retrieval (when documents are present) + solver → evaluator → improver
import type {
  Chunk,
  PipelineRun,
  RetrievalResult,
  RunRequest,
  StageFailure,
  StageName,
  StageResult,
} from '../types/core';
import { countWords, extractCritiqueScore } from './critique-agent';
import type { Retriever } from './document-retriever';
import { logger } from './logger';
import type { MetricsEngine } from './metrics-engine';
import { totalRunTime } from './metrics-engine';
import type { StageRouter } from './model-router';
import { RetrievalFailureError, isPipelineError, toStageFailure } from './pipeline-errors';
import {
  buildEvaluatorPrompt,
  buildGroundedAnswerPrompt,
  buildImproverPrompt,
  buildSolverPrompt,
} from './prompt-templates';

export interface ReasoningPipelineDeps {
  retriever: Retriever;
  router: StageRouter;
  metrics: MetricsEngine;
}

interface GroundingOutcome {
  chunks: Chunk[];
  ragTimeMs?: number;
  groundedAnswer?: string;
  retrievalError?: StageFailure;
}

export class ReasoningPipeline {
  constructor(private readonly deps: ReasoningPipelineDeps) {}

  async run(request: RunRequest): Promise<PipelineRun> {
    const { query, mode, documents } = request;
    logger.info('pipeline:start', {
      mode,
      queryLength: query.length,
      documents: documents.length,
      backend: this.deps.router.primaryKind,
    });

    const grounding: GroundingOutcome = documents.length > 0 ? await this.ground(request) : { chunks: [] };
    const { chunks, ragTimeMs, groundedAnswer, retrievalError } = grounding;

    const stageResults: StageResult[] = [];
    let currentStage: StageName = 'solver';
    try {
      const solver = await this.deps.router.generate(
        'solver',
        buildSolverPrompt({ query, mode, chunks }),
      );
      stageResults.push(solver);

      currentStage = 'evaluator';
      const evaluator = await this.deps.router.generate(
        'evaluator',
        buildEvaluatorPrompt({ query, mode, solverOutput: solver.text }),
      );
      stageResults.push(evaluator);

      currentStage = 'improver';
      const improver = await this.deps.router.generate(
        'improver',
        buildImproverPrompt({ query, mode, solverOutput: solver.text, critique: evaluator.text }),
      );
      stageResults.push(improver);
    } catch (error) {
      const failure = toStageFailure(error);
      logger.error('pipeline:failed', { stage: currentStage, code: failure.code, message: failure.message });
      const metrics = await this.deps.metrics.evaluate({ query, chunks, stageResults, ragTimeMs });
      return {
        status: 'failed',
        query,
        mode,
        failedStage: currentStage,
        error: failure,
        stageResults,
        chunks,
        ragTimeMs,
        totalTimeMs: totalRunTime(ragTimeMs, stageResults),
        metrics,
        ...(groundedAnswer !== undefined ? { groundedAnswer } : {}),
        ...(retrievalError ? { retrievalError } : {}),
      };
    }

    const [, evaluator, improver] = stageResults;
    const metrics = await this.deps.metrics.evaluate({ query, chunks, stageResults, ragTimeMs });
    const totalTimeMs = totalRunTime(ragTimeMs, stageResults);

    logger.info('pipeline:done', {
      grounded: chunks.length > 0,
      fellBack: stageResults.filter((r) => r.fellBack).map((r) => r.stage),
      totalTimeMs,
    });

    return {
      status: 'completed',
      query,
      mode,
      finalAnswer: improver.text,
      stageResults,
      chunks,
      ragTimeMs,
      totalTimeMs,
      evaluatorScore: extractCritiqueScore(evaluator.text),
      answerWordCount: countWords(improver.text),
      metrics,
      ...(groundedAnswer !== undefined ? { groundedAnswer } : {}),
      ...(retrievalError ? { retrievalError } : {}),
    };
  }

  /**
   * Retrieval plus the document-only answer from the local model; both count as RAG time.
   * A retrieval failure downgrades the run to ungrounded instead of aborting it.
   */
  private async ground(request: RunRequest): Promise<GroundingOutcome> {
    let retrieved: RetrievalResult;
    try {
      retrieved = await this.deps.retriever.retrieve(request.query, request.documents);
    } catch (error) {
      if (!(error instanceof RetrievalFailureError)) throw error;
      logger.warn('retrieval:failed, continuing without documents', { message: error.message });
      return { chunks: [], retrievalError: error.toJSON() };
    }

    const local = this.deps.router.localBackend;
    if (!local) {
      return { chunks: retrieved.chunks, ragTimeMs: retrieved.elapsedMs };
    }

    try {
      const answer = await this.deps.router.generateOn(
        local,
        buildGroundedAnswerPrompt({ query: request.query, chunks: retrieved.chunks }),
      );
      return {
        chunks: retrieved.chunks,
        ragTimeMs: retrieved.elapsedMs + answer.elapsedMs,
        groundedAnswer: answer.text,
      };
    } catch (error) {
      if (!isPipelineError(error)) throw error;
      logger.warn('grounded-answer:failed', { code: error.code, message: error.message });
      return { chunks: retrieved.chunks, ragTimeMs: retrieved.elapsedMs };
    }
  }
}
