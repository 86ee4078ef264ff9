// node/src/services/llm-client.ts — cloud backend over an OpenAI-compatible chat completions API

import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { GenerationBackend, GenerationRequest } from './model-router';
import { BackendUnavailableError, QuotaExceededError } from './pipeline-errors';

interface ChatCompletionLike {
  choices: Array<{ message?: { content?: string | null } }>;
}

/** The slice of the SDK client this backend calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletionLike>;
    };
  };
}

export interface CloudBackendOptions {
  apiKey?: string;
  baseUrl: string;
  model: string;
  /** Injected in tests; otherwise created on first call. */
  client?: ChatCompletionsClient;
}

const QUOTA_PATTERN = /quota|rate.?limit|resource.?exhausted|too many requests/i;

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

/** Maps an SDK failure onto the pipeline's error kinds. */
export function classifyCloudError(error: unknown): QuotaExceededError | BackendUnavailableError {
  const message = error instanceof Error ? error.message : String(error);
  const status = statusOf(error);

  if (status === 429 || QUOTA_PATTERN.test(message)) {
    return new QuotaExceededError(`Cloud backend quota exceeded: ${message}`, error);
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new BackendUnavailableError('cloud', `Cloud backend not reachable: ${message}`, error);
  }
  if (status !== undefined) {
    return new BackendUnavailableError('cloud', `Cloud backend returned HTTP ${status}: ${message}`, error);
  }
  return new BackendUnavailableError('cloud', `Cloud backend call failed: ${message}`, error);
}

export class CloudGenerationBackend implements GenerationBackend {
  readonly kind = 'cloud' as const;
  private client: ChatCompletionsClient | null;

  constructor(private readonly options: CloudBackendOptions) {
    this.client = options.client ?? null;
  }

  private getClient(): ChatCompletionsClient {
    if (!this.client) {
      if (!this.options.apiKey) {
        throw new BackendUnavailableError(
          'cloud',
          'Missing CLOUD_API_KEY (or GEMINI_API_KEY). Set it in .env or pass it when starting the server.',
        );
      }
      // StageRouter owns the single retry (on the local backend); the SDK must not add its own.
      this.client = new OpenAI({ apiKey: this.options.apiKey, baseURL: this.options.baseUrl, maxRetries: 0 });
    }
    return this.client;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const client = this.getClient();

    let content: string | null | undefined;
    try {
      const res = await client.chat.completions.create({
        model: this.options.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt },
        ],
        temperature: request.temperature ?? 0.5,
        max_tokens: request.maxTokens ?? 2048,
      });
      content = res.choices[0]?.message?.content;
    } catch (error) {
      throw classifyCloudError(error);
    }

    const text = content?.trim() ?? '';
    if (!text) {
      throw new BackendUnavailableError('cloud', `Cloud model ${this.options.model} returned an empty response`);
    }
    return text;
  }
}
