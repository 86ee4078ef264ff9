// node/src/services/prompt-templates.ts — stage prompts for the solver / evaluator / improver chain

import type { Chunk, ReasoningMode } from '../types/core';
import type { GenerationRequest } from './model-router';

const MODE_HINTS: Record<ReasoningMode, string> = {
  engineering: 'Provide architecture, tools, algorithms and implementation steps.',
  policy: 'Provide governance, policy frameworks, rollout strategy, and risk analysis.',
  research: 'Provide a research-style output: method, evaluation, experiments, contributions.',
};

export function modeHint(mode: ReasoningMode): string {
  return MODE_HINTS[mode];
}

/** Chunks as the model sees them: numbered by rank, with the retrieval score. */
export function formatChunks(chunks: Chunk[]): string {
  return chunks
    .map((c) => `[Chunk ${c.rank} | score=${c.score.toFixed(3)}]\n${c.text}`)
    .join('\n\n');
}

export function buildSolverPrompt(params: {
  query: string;
  mode: ReasoningMode;
  chunks?: Chunk[];
}): GenerationRequest {
  const { query, mode, chunks } = params;
  const evidence = chunks && chunks.length > 0 ? chunks : null;

  const system = evidence
    ? `You are a solution-generation agent specialising in ${mode} tasks. ${modeHint(mode)}
You receive the user's question and document chunks retrieved from files the user uploaded.
Treat the chunks as evidence: prefer them over prior knowledge and cite them as [Chunk n].
If the chunks do not cover part of the question, say so before answering that part from general knowledge.`
    : `You are a solution-generation agent specialising in ${mode} tasks. ${modeHint(mode)}
You have NO document context for this question. Answer from your own knowledge; be structured, clear, and detailed.`;

  const prompt = evidence
    ? `Task:
${query}

Retrieved document chunks:
${formatChunks(evidence)}

Produce a complete and structured answer.`
    : `Task:
${query}

Produce a complete and structured answer.`;

  return { system, prompt };
}

export function buildEvaluatorPrompt(params: {
  query: string;
  mode: ReasoningMode;
  solverOutput: string;
}): GenerationRequest {
  const system = `You are an AI evaluator for ${params.mode} answers.
Given a task and a candidate answer, you must:
1) Summarize the answer in 2-3 lines
2) List strengths
3) List weaknesses
4) Suggest concrete improvements
At the end, output a separate final line in the format:
SCORE: x.y
where x.y is a number from 0 to 10 (e.g., SCORE: 7.5).`;

  const prompt = `Task:
${params.query}

Candidate answer:
"""
${params.solverOutput}
"""`;

  return { system, prompt, temperature: 0.2 };
}

export function buildImproverPrompt(params: {
  query: string;
  mode: ReasoningMode;
  solverOutput: string;
  critique: string;
}): GenerationRequest {
  const system = `You are an expert improvement agent for ${params.mode} tasks. ${modeHint(params.mode)}
You receive the original task, a draft solution, and an evaluator's critique.
1. Fix the weaknesses mentioned
2. Reduce unnecessary content
3. Improve feasibility and technical depth
4. Keep it concise and professional
Return only the improved final answer, without commentary about the critique.`;

  const prompt = `Task:
${params.query}

Draft solution:
"""
${params.solverOutput}
"""

Evaluator critique:
"""
${params.critique}
"""`;

  return { system, prompt };
}

/** Document-only answer from the local model; shown next to the final answer. */
export function buildGroundedAnswerPrompt(params: { query: string; chunks: Chunk[] }): GenerationRequest {
  const system = `You are a precise research assistant.
Answer the user's question only using the context from the document chunks provided.
If something is not supported by the context, say you don't know.`;

  const prompt = `[QUESTION]
${params.query}

[CONTEXT]
${formatChunks(params.chunks)}

Now provide a clear, well-structured answer grounded in this context.`;

  return { system, prompt, temperature: 0.2 };
}
