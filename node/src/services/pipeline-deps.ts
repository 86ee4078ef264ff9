// node/src/services/pipeline-deps.ts — wires retriever, backends and metrics from AppConfig
import type { AppConfig } from '../config/app.config';
import type { Clock } from '../utils/clock';
import { systemClock } from '../utils/clock';
import { DocumentRetriever } from './document-retriever';
import { OllamaEmbedder } from './embeddings/ollama-embedder';
import { SimpleEmbedder } from './embeddings/simple-embedder';
import { CloudGenerationBackend } from './llm-client';
import { OllamaGenerationBackend } from './local-llm';
import { MetricsEngine } from './metrics-engine';
import type { GenerationBackend } from './model-router';
import { StageRouter } from './model-router';
import { ReasoningPipeline } from './reasoning-pipeline';
import type { Embedder } from './retrieval-vector-utils';

export function createEmbedder(config: AppConfig): Embedder {
  return config.embedder === 'ollama'
    ? new OllamaEmbedder(config.ollama.url, config.ollama.embedModel)
    : new SimpleEmbedder();
}

/**
 * The local backend always exists: it is the primary in local mode and the
 * fallback (and grounded-answer model) in cloud mode.
 */
export function createStageRouter(config: AppConfig, clock: Clock = systemClock): StageRouter {
  const local: GenerationBackend = new OllamaGenerationBackend({
    baseUrl: config.ollama.url,
    model: config.ollama.model,
    timeoutMs: config.ollama.timeoutMs,
  });
  if (config.generationBackend === 'local') {
    return new StageRouter(local, null, clock);
  }
  const cloud = new CloudGenerationBackend({
    apiKey: config.cloud.apiKey,
    baseUrl: config.cloud.baseUrl,
    model: config.cloud.model,
  });
  return new StageRouter(cloud, local, clock);
}

export function createPipeline(config: AppConfig, clock: Clock = systemClock): ReasoningPipeline {
  const embedder = createEmbedder(config);
  // Metrics always use the deterministic embedder so scores are reproducible across runs.
  const metricsEmbedder = config.embedder === 'simple' ? embedder : new SimpleEmbedder();
  return new ReasoningPipeline({
    retriever: new DocumentRetriever(embedder, config.retrieval, clock),
    router: createStageRouter(config, clock),
    metrics: new MetricsEngine(metricsEmbedder),
  });
}
