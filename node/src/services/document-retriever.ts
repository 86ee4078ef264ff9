// node/src/services/document-retriever.ts — per-run chunk / embed / rank over uploaded documents
import type { Chunk, RetrievalResult, SourceDocument } from '../types/core';
import type { Clock } from '../utils/clock';
import { systemClock } from '../utils/clock';
import { chunkText, extractTextFromDocument } from './fileProcessingService';
import { logger } from './logger';
import { RetrievalFailureError, isPipelineError } from './pipeline-errors';
import type { Embedder } from './retrieval-vector-utils';
import { cosineSimilarity, roundScore } from './retrieval-vector-utils';

export interface RetrieverOptions {
  topK: number;
  chunkSize: number;
  chunkOverlap: number;
}

export interface Retriever {
  retrieve(query: string, documents: SourceDocument[]): Promise<RetrievalResult>;
}

interface PendingChunk {
  id: string;
  text: string;
  source: string;
}

export class DocumentRetriever implements Retriever {
  constructor(
    private readonly embedder: Embedder,
    private readonly options: RetrieverOptions,
    private readonly clock: Clock = systemClock,
  ) {}

  async retrieve(query: string, documents: SourceDocument[]): Promise<RetrievalResult> {
    const start = this.clock();

    const pending: PendingChunk[] = [];
    for (const [docIndex, doc] of documents.entries()) {
      const text = await extractTextFromDocument(doc);
      const pieces = chunkText(text, this.options.chunkSize, this.options.chunkOverlap);
      // The document index keeps ids distinct when two uploads share a file name.
      pieces.forEach((piece, i) => {
        pending.push({ id: `${docIndex}:${doc.fileName}#c${i}`, text: piece, source: doc.fileName });
      });
    }

    if (pending.length === 0) {
      throw new RetrievalFailureError('No text could be extracted from the uploaded documents');
    }

    const chunks = await this.rank(query, pending);
    const elapsedMs = this.clock() - start;

    logger.info('retrieval:done', {
      documents: documents.length,
      candidates: pending.length,
      returned: chunks.length,
      elapsedMs,
    });
    return { chunks, elapsedMs };
  }

  private async rank(query: string, pending: PendingChunk[]): Promise<Chunk[]> {
    try {
      const queryEmb = await this.embedder.embed(query);
      const embeddings = await Promise.all(pending.map((c) => this.embedder.embed(c.text)));
      const scored = pending.map((chunk, i) => ({
        chunk,
        score: cosineSimilarity(queryEmb, embeddings[i]),
      }));
      // Array.prototype.sort is stable: ties keep document order.
      scored.sort((a, b) => b.score - a.score);
      return scored.slice(0, this.options.topK).map((s, i) => ({
        ...s.chunk,
        rank: i + 1,
        score: roundScore(s.score),
      }));
    } catch (error) {
      if (isPipelineError(error)) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new RetrievalFailureError(`Embedding failed: ${reason}`, error);
    }
  }
}
