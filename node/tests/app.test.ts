import { once } from 'events';
import type { Server } from 'http';
import axios from 'axios';
import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../src/app';
import { loadConfig } from '../src/config/app.config';
import type { PipelineRunner } from '../src/routes/run';
import type { MetricReport, PipelineRun, RunRequest } from '../src/types/core';
import { stage } from './helpers';

const NA = { kind: 'notApplicable', reason: 'no grounding documents' } as const;
const METRICS: MetricReport = {
  precision: { kind: 'computed', value: 0.5, unit: 'score' },
  recall: NA,
  alignment: NA,
  coherence: { kind: 'computed', value: 1, unit: 'score' },
  groundedness: NA,
  novelty: { kind: 'computed', value: 0.4, unit: 'score' },
  ragTime: NA,
  generationTime: { kind: 'computed', value: 300, unit: 'ms' },
  totalTime: { kind: 'computed', value: 300, unit: 'ms' },
};

function completed(request: RunRequest): PipelineRun {
  return {
    status: 'completed',
    query: request.query,
    mode: request.mode,
    finalAnswer: 'Final answer.',
    evaluatorScore: 8,
    answerWordCount: 2,
    stageResults: [stage('solver', 's'), stage('evaluator', 'e'), stage('improver', 'Final answer.')],
    chunks: [],
    totalTimeMs: 300,
    metrics: METRICS,
  };
}

function failed(request: RunRequest): PipelineRun {
  return {
    status: 'failed',
    query: request.query,
    mode: request.mode,
    failedStage: 'solver',
    error: { code: 'BACKEND_UNAVAILABLE', message: 'connection refused', backend: 'local' },
    stageResults: [],
    chunks: [],
    totalTimeMs: 0,
    metrics: METRICS,
  };
}

class FakeRunner implements PipelineRunner {
  readonly requests: RunRequest[] = [];
  outcome: ((request: RunRequest) => PipelineRun) | Error = completed;

  async run(request: RunRequest): Promise<PipelineRun> {
    this.requests.push(request);
    if (this.outcome instanceof Error) throw this.outcome;
    return this.outcome(request);
  }
}

const runner = new FakeRunner();
const http = axios.create({ validateStatus: () => true });
let server: Server;
let baseUrl: string;

beforeAll(async () => {
  server = createApp(loadConfig({ NODE_ENV: 'test', GENERATION_BACKEND: 'local' }), runner).listen(0);
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server has no port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(
  () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    }),
);

beforeEach(() => {
  runner.requests.length = 0;
  runner.outcome = completed;
});

describe('GET /health', () => {
  it('reports the generation backend', async () => {
    const res = await http.get(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(res.data).toMatchObject({ status: 'OK', environment: 'test', generationBackend: 'local' });
  });
});

describe('POST /api/run', () => {
  it('runs the pipeline for a JSON body', async () => {
    const res = await http.post(`${baseUrl}/api/run`, { question: ' Summarize section 2 ', mode: 'Policy' });

    expect(res.status).toBe(200);
    expect(res.data.success).toBe(true);
    expect(res.data.data).toMatchObject({ status: 'completed', finalAnswer: 'Final answer.', evaluatorScore: 8 });
    expect(runner.requests).toEqual([{ query: 'Summarize section 2', mode: 'policy', documents: [] }]);
  });

  it('passes uploaded documents to the pipeline', async () => {
    const form = new FormData();
    form.append('question', 'What is the error budget?');
    form.append('documents', new Blob(['The error budget is 0.1%.'], { type: 'text/plain' }), 'slo.txt');

    const res = await http.post(`${baseUrl}/api/run`, form);

    expect(res.status).toBe(200);
    expect(runner.requests).toHaveLength(1);
    const [doc] = runner.requests[0].documents;
    expect(doc.fileName).toBe('slo.txt');
    expect(doc.mimeType).toBe('text/plain');
    expect(doc.content.toString('utf-8')).toBe('The error budget is 0.1%.');
  });

  it('rejects unsupported uploads', async () => {
    const form = new FormData();
    form.append('question', 'q');
    form.append('documents', new Blob([new Uint8Array([0x89, 0x50])], { type: 'image/png' }), 'photo.png');

    const res = await http.post(`${baseUrl}/api/run`, form);

    expect(res.status).toBe(400);
    expect(res.data).toEqual({
      success: false,
      message: 'Invalid file type for photo.png (image/png). Allowed: PDF, DOCX, TXT, MD',
      code: 'INVALID_UPLOAD',
    });
    expect(runner.requests).toHaveLength(0);
  });

  it('rejects an empty question', async () => {
    const res = await http.post(`${baseUrl}/api/run`, { question: '  ' });

    expect(res.status).toBe(400);
    expect(res.data).toEqual({
      success: false,
      message: 'Invalid request',
      errors: [{ path: 'question', message: 'Question is required and cannot be empty' }],
      code: 'VALIDATION_ERROR',
    });
  });

  it('returns 502 with the partial run when a stage fails', async () => {
    runner.outcome = failed;

    const res = await http.post(`${baseUrl}/api/run`, { question: 'Summarize section 2' });

    expect(res.status).toBe(502);
    expect(res.data).toMatchObject({
      success: false,
      message: 'connection refused',
      code: 'BACKEND_UNAVAILABLE',
      data: { status: 'failed', failedStage: 'solver', totalTimeMs: 0 },
    });
  });

  it('hands unexpected errors to the error handler', async () => {
    runner.outcome = new Error('unexpected');

    const res = await http.post(`${baseUrl}/api/run`, { question: 'Summarize section 2' });

    expect(res.status).toBe(500);
    expect(res.data).toEqual({ success: false, message: 'Internal Server Error', code: 'INTERNAL_ERROR' });
  });
});

describe('UI routes', () => {
  it('serves the form', async () => {
    const res = await http.get(`${baseUrl}/`);
    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toContain('text/html');
    expect(res.headers['content-security-policy']).toContain("style-src 'self' 'unsafe-inline'");
    expect(res.data).toContain('<form method="post" action="/run" enctype="multipart/form-data">');
    expect(res.data).toContain('Generation backend: local');
  });

  it('renders the run result', async () => {
    const form = new FormData();
    form.append('question', 'Summarize section 2');
    form.append('mode', 'engineering');

    const res = await http.post(`${baseUrl}/run`, form);

    expect(res.status).toBe(200);
    expect(res.data).toContain('<section id="final-answer">');
    expect(res.data).toContain('Evaluator score: 8.0 / 10 · 2 words');
    expect(res.data).toContain('<option value="engineering" selected>engineering</option>');
  });

  it('re-renders the form with the validation message', async () => {
    const res = await http.post(`${baseUrl}/run`, 'question=&mode=research', {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    });

    expect(res.status).toBe(400);
    expect(res.data).toContain('<div class="notice error">Question is required and cannot be empty</div>');
    expect(runner.requests).toHaveLength(0);
  });

  it('answers 502 when the run failed', async () => {
    runner.outcome = failed;
    const res = await http.post(`${baseUrl}/run`, 'question=hello', {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    });

    expect(res.status).toBe(502);
    expect(res.data).toContain('The solver stage failed (BACKEND_UNAVAILABLE): connection refused');
  });

  it('answers 404 for unknown routes', async () => {
    const res = await http.get(`${baseUrl}/nope`);
    expect(res.status).toBe(404);
    expect(res.data).toEqual({ success: false, message: 'Route GET /nope not found', code: 'NOT_FOUND' });
  });
});
