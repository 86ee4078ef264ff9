// node/src/services/local-llm.ts — local backend: Ollama /api/generate over HTTP
import axios from 'axios';
import type { GenerationBackend, GenerationRequest } from './model-router';
import { BackendUnavailableError } from './pipeline-errors';

export interface LocalBackendOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

interface OllamaGenerateResponse {
  response?: unknown;
}

export class OllamaGenerationBackend implements GenerationBackend {
  readonly kind = 'local' as const;

  constructor(private readonly options: LocalBackendOptions) {}

  async generate(request: GenerationRequest): Promise<string> {
    const url = `${this.options.baseUrl}/api/generate`;
    let raw: unknown;
    try {
      const res = await axios.post<OllamaGenerateResponse>(
        url,
        {
          model: this.options.model,
          system: request.system,
          prompt: request.prompt,
          stream: false,
          options: {
            temperature: request.temperature ?? 0.5,
            num_predict: request.maxTokens ?? 2048,
          },
        },
        { timeout: this.options.timeoutMs },
      );
      raw = res.data.response;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const detail = error.response
          ? `HTTP ${error.response.status}`
          : error.code ?? error.message;
        throw new BackendUnavailableError('local', `Local generation service not reachable at ${url} (${detail})`, error);
      }
      throw new BackendUnavailableError(
        'local',
        `Local generation failed: ${error instanceof Error ? error.message : String(error)}`,
        error,
      );
    }

    const text = typeof raw === 'string' ? raw.trim() : '';
    if (!text) {
      throw new BackendUnavailableError('local', `Local model ${this.options.model} returned an empty response`);
    }
    return text;
  }
}
