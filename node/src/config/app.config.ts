/**
 * App configuration.
 * Read once from the environment (after dotenv has loaded .env) and validated with zod.
 */
import { z } from 'zod';

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const optionalSecret = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() === '' ? undefined : v),
  z.string().trim().min(1).optional(),
);

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  GENERATION_BACKEND: z.enum(['cloud', 'local']).default('cloud'),
  CLOUD_API_KEY: optionalSecret,
  GEMINI_API_KEY: optionalSecret,
  CLOUD_BASE_URL: z.string().url().default('https://generativelanguage.googleapis.com/v1beta/openai/'),
  CLOUD_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  OLLAMA_URL: z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().min(1).default('llama3.1:latest'),
  OLLAMA_TIMEOUT_MS: intFromEnv(600_000),
  EMBEDDER: z.enum(['simple', 'ollama']).default('simple'),
  OLLAMA_EMBED_MODEL: z.string().min(1).default('nomic-embed-text'),
  RETRIEVAL_TOP_K: intFromEnv(5),
  CHUNK_SIZE: intFromEnv(800),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(100),
  MAX_UPLOAD_BYTES: intFromEnv(20 * 1024 * 1024),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
});

export type LogLevelName = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevelName;
  generationBackend: 'cloud' | 'local';
  cloud: { apiKey?: string; baseUrl: string; model: string };
  ollama: { url: string; model: string; timeoutMs: number; embedModel: string };
  embedder: 'simple' | 'ollama';
  retrieval: { topK: number; chunkSize: number; chunkOverlap: number };
  maxUploadBytes: number;
  corsOrigins: string[];
}

export class ConfigError extends Error {
  constructor(readonly issues: Array<{ path: string; message: string }>) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    );
  }
  const parsed = result.data;
  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new ConfigError([{ path: 'CHUNK_OVERLAP', message: 'must be smaller than CHUNK_SIZE' }]);
  }

  return Object.freeze({
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    generationBackend: parsed.GENERATION_BACKEND,
    cloud: {
      apiKey: parsed.CLOUD_API_KEY ?? parsed.GEMINI_API_KEY,
      baseUrl: parsed.CLOUD_BASE_URL,
      model: parsed.CLOUD_MODEL,
    },
    ollama: {
      url: parsed.OLLAMA_URL.replace(/\/+$/, ''),
      model: parsed.OLLAMA_MODEL,
      timeoutMs: parsed.OLLAMA_TIMEOUT_MS,
      embedModel: parsed.OLLAMA_EMBED_MODEL,
    },
    embedder: parsed.EMBEDDER,
    retrieval: {
      topK: parsed.RETRIEVAL_TOP_K,
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
    },
    maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
    corsOrigins: parsed.CORS_ORIGIN.split(',').map((s) => s.trim()).filter(Boolean),
  });
}

/** Loggable view of the config; the credential is reduced to whether it is set. */
export function describeConfig(config: AppConfig): Record<string, unknown> {
  return {
    port: config.port,
    nodeEnv: config.nodeEnv,
    generationBackend: config.generationBackend,
    cloudModel: config.cloud.model,
    cloudApiKey: config.cloud.apiKey ? 'set' : 'missing',
    ollamaUrl: config.ollama.url,
    ollamaModel: config.ollama.model,
    embedder: config.embedder,
    retrieval: config.retrieval,
  };
}
