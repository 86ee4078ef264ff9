// node/src/services/embeddings/ollama-embedder.ts — embeddings from the local Ollama server
import axios from 'axios';
import type { Embedder, Embedding } from '../retrieval-vector-utils';

interface OllamaEmbeddingResponse {
  embedding?: unknown;
}

export class OllamaEmbedder implements Embedder {
  constructor(
    private readonly baseUrl: string,
    private readonly model: string,
    private readonly timeoutMs = 60_000,
  ) {}

  async embed(text: string): Promise<Embedding> {
    const res = await axios.post<OllamaEmbeddingResponse>(
      `${this.baseUrl}/api/embeddings`,
      { model: this.model, prompt: text },
      { timeout: this.timeoutMs },
    );
    const { embedding } = res.data;
    if (!Array.isArray(embedding) || !embedding.every((x): x is number => typeof x === 'number')) {
      throw new Error(`Ollama returned no embedding for model ${this.model}`);
    }
    return embedding;
  }
}
