import { describe, expect, it } from 'vitest';
import {
  buildEvaluatorPrompt,
  buildGroundedAnswerPrompt,
  buildImproverPrompt,
  buildSolverPrompt,
  formatChunks,
  modeHint,
} from '../src/services/prompt-templates';
import { chunk } from './helpers';

describe('prompt templates', () => {
  it('formats chunks by rank with their score', () => {
    expect(formatChunks([chunk(1, 'First.', 0.8123), chunk(2, 'Second.', 0.5)])).toBe(
      '[Chunk 1 | score=0.812]\nFirst.\n\n[Chunk 2 | score=0.500]\nSecond.',
    );
  });

  it('builds an ungrounded solver prompt', () => {
    const req = buildSolverPrompt({ query: 'Design a cache', mode: 'engineering' });
    expect(req.prompt).toBe('Task:\nDesign a cache\n\nProduce a complete and structured answer.');
    expect(req.system).toContain(modeHint('engineering'));
    expect(req.system).toContain('NO document context');
  });

  it('treats an empty chunk list as ungrounded', () => {
    const req = buildSolverPrompt({ query: 'q', mode: 'policy', chunks: [] });
    expect(req.prompt).not.toContain('Retrieved document chunks:');
  });

  it('puts retrieved chunks into the grounded solver prompt', () => {
    const req = buildSolverPrompt({ query: 'q', mode: 'research', chunks: [chunk(1, 'Evidence.', 0.9)] });
    expect(req.prompt).toBe(
      'Task:\nq\n\nRetrieved document chunks:\n[Chunk 1 | score=0.900]\nEvidence.\n\nProduce a complete and structured answer.',
    );
    expect(req.system).toContain('[Chunk n]');
  });

  it('asks the evaluator for a final score line', () => {
    const req = buildEvaluatorPrompt({ query: 'q', mode: 'research', solverOutput: 'draft' });
    expect(req.prompt).toBe('Task:\nq\n\nCandidate answer:\n"""\ndraft\n"""');
    expect(req.system).toContain('SCORE: x.y');
    expect(req.temperature).toBe(0.2);
  });

  it('gives the improver the draft and the critique', () => {
    const req = buildImproverPrompt({ query: 'q', mode: 'policy', solverOutput: 'draft', critique: 'too long' });
    expect(req.prompt).toBe('Task:\nq\n\nDraft solution:\n"""\ndraft\n"""\n\nEvaluator critique:\n"""\ntoo long\n"""');
    expect(req.system).toContain(modeHint('policy'));
  });

  it('restricts the grounded answer to the context', () => {
    const req = buildGroundedAnswerPrompt({ query: 'q', chunks: [chunk(1, 'Evidence.', 0.9)] });
    expect(req.prompt).toBe(
      '[QUESTION]\nq\n\n[CONTEXT]\n[Chunk 1 | score=0.900]\nEvidence.\n\nNow provide a clear, well-structured answer grounded in this context.',
    );
    expect(req.temperature).toBe(0.2);
  });
});
