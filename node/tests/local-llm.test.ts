import { beforeEach, describe, expect, it, vi } from 'vitest';

const { post } = vi.hoisted(() => ({ post: vi.fn() }));

vi.mock('axios', () => ({
  default: {
    post,
    isAxiosError: (error: unknown) =>
      typeof error === 'object' && error !== null && 'isAxiosError' in error && error.isAxiosError === true,
  },
}));

import { OllamaEmbedder } from '../src/services/embeddings/ollama-embedder';
import { OllamaGenerationBackend } from '../src/services/local-llm';
import { BackendUnavailableError } from '../src/services/pipeline-errors';

const backend = new OllamaGenerationBackend({ baseUrl: 'http://ollama.test:11434', model: 'llama-test', timeoutMs: 1000 });

function axiosFailure(fields: { code?: string; response?: { status: number } }) {
  return Object.assign(new Error('request failed'), { isAxiosError: true }, fields);
}

describe('OllamaGenerationBackend', () => {
  beforeEach(() => {
    post.mockReset();
  });

  it('posts a non-streaming generate request and trims the response', async () => {
    post.mockResolvedValue({ data: { response: '\n Local answer. ' } });

    await expect(backend.generate({ system: 'sys', prompt: 'question', temperature: 0.2 })).resolves.toBe('Local answer.');
    expect(post).toHaveBeenCalledWith(
      'http://ollama.test:11434/api/generate',
      {
        model: 'llama-test',
        system: 'sys',
        prompt: 'question',
        stream: false,
        options: { temperature: 0.2, num_predict: 2048 },
      },
      { timeout: 1000 },
    );
  });

  it('reports a refused connection as an unavailable backend', async () => {
    post.mockRejectedValue(axiosFailure({ code: 'ECONNREFUSED' }));

    const error = await backend.generate({ system: 's', prompt: 'p' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendUnavailableError);
    expect(error).toMatchObject({
      backend: 'local',
      message: 'Local generation service not reachable at http://ollama.test:11434/api/generate (ECONNREFUSED)',
    });
  });

  it('includes the HTTP status when the server answered with an error', async () => {
    post.mockRejectedValue(axiosFailure({ response: { status: 404 } }));

    await expect(backend.generate({ system: 's', prompt: 'p' })).rejects.toThrow(
      'Local generation service not reachable at http://ollama.test:11434/api/generate (HTTP 404)',
    );
  });

  it('rejects an empty response', async () => {
    post.mockResolvedValue({ data: { response: '   ' } });

    await expect(backend.generate({ system: 's', prompt: 'p' })).rejects.toThrow(
      'Local model llama-test returned an empty response',
    );
  });
});

describe('OllamaEmbedder', () => {
  beforeEach(() => {
    post.mockReset();
  });

  it('returns the embedding vector', async () => {
    post.mockResolvedValue({ data: { embedding: [0.1, 0.2, 0.3] } });
    const embedder = new OllamaEmbedder('http://ollama.test:11434', 'embed-test', 500);

    await expect(embedder.embed('some text')).resolves.toEqual([0.1, 0.2, 0.3]);
    expect(post).toHaveBeenCalledWith(
      'http://ollama.test:11434/api/embeddings',
      { model: 'embed-test', prompt: 'some text' },
      { timeout: 500 },
    );
  });

  it('rejects a malformed payload', async () => {
    post.mockResolvedValue({ data: { embedding: ['x'] } });
    const embedder = new OllamaEmbedder('http://ollama.test:11434', 'embed-test');

    await expect(embedder.embed('some text')).rejects.toThrow('Ollama returned no embedding for model embed-test');
  });
});
