// Test doubles shared by the pipeline, router and route tests.
import type { BackendKind, Chunk, RetrievalResult, SourceDocument, StageName, StageResult } from '../src/types/core';
import type { Retriever } from '../src/services/document-retriever';
import type { GenerationBackend, GenerationRequest } from '../src/services/model-router';
import type { Clock } from '../src/utils/clock';

export class ManualClock {
  private current = 0;

  readonly now: Clock = () => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

type Reply = string | Error | ((request: GenerationRequest) => string);

/** Scripted backend: replies are consumed in order, the last one repeats. */
export class FakeBackend implements GenerationBackend {
  readonly calls: GenerationRequest[] = [];
  private readonly replies: Reply[];

  constructor(
    readonly kind: BackendKind,
    replies: Reply[],
    private readonly clock?: ManualClock,
    private readonly latencyMs = 0,
  ) {
    this.replies = replies;
  }

  async generate(request: GenerationRequest): Promise<string> {
    this.calls.push(request);
    this.clock?.advance(this.latencyMs);
    const reply = this.replies[Math.min(this.calls.length - 1, this.replies.length - 1)];
    if (reply instanceof Error) throw reply;
    return typeof reply === 'function' ? reply(request) : reply;
  }
}

export class FakeRetriever implements Retriever {
  readonly calls: Array<{ query: string; documents: SourceDocument[] }> = [];

  constructor(
    private readonly result: RetrievalResult | Error,
    private readonly clock?: ManualClock,
  ) {}

  async retrieve(query: string, documents: SourceDocument[]): Promise<RetrievalResult> {
    this.calls.push({ query, documents });
    if (this.result instanceof Error) throw this.result;
    this.clock?.advance(this.result.elapsedMs);
    return this.result;
  }
}

export function chunk(rank: number, text: string, score = 0.5): Chunk {
  return { id: `doc.pdf#c${rank - 1}`, text, rank, score, source: 'doc.pdf' };
}

export function stage(name: StageName, text: string, elapsedMs = 100): StageResult {
  return { stage: name, text, elapsedMs, backend: 'cloud', prompt: `${name} prompt`, fellBack: false };
}

export function textDocument(fileName: string, text: string): SourceDocument {
  return { fileName, mimeType: 'text/plain', content: Buffer.from(text, 'utf-8') };
}
