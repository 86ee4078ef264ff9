// node/src/services/embeddings/simple-embedder.ts
// Deterministic hashed bag-of-words embedding. No network, same vector for the same text.

import type { Embedder, Embedding } from '../retrieval-vector-utils';
import { contentTokens } from '../retrieval-vector-utils';

export class SimpleEmbedder implements Embedder {
  constructor(private readonly dim = 256) {}

  async embed(text: string): Promise<Embedding> {
    const vec: number[] = new Array<number>(this.dim).fill(0);

    for (const token of contentTokens(text)) {
      let hash = 0;
      for (let i = 0; i < token.length; i++) {
        hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
      }
      vec[hash % this.dim] += 1;
    }

    const norm = Math.sqrt(vec.reduce((s, x) => s + x * x, 0));
    if (norm === 0) return vec;
    return vec.map((x) => x / norm);
  }
}
