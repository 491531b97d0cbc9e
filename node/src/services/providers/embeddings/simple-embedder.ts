// node/src/services/providers/embeddings/simple-embedder.ts
// Deterministic hashed bag-of-words embedding. Offline/dev only; retrieval quality is far below a trained model.

import type { Embedder, Embedding } from '../retrieval-vector-utils';
import { normalize, tokenize } from '../retrieval-vector-utils';

export class SimpleEmbedder implements Embedder {
  private readonly dim: number;

  constructor(dim = 256) {
    this.dim = dim;
  }

  async embed(text: string): Promise<Embedding> {
    const vec = new Array<number>(this.dim).fill(0);

    for (const token of tokenize(text)) {
      let hash = 0;
      for (let i = 0; i < token.length; i++) {
        hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
      }
      vec[hash % this.dim] += 1;
    }

    return normalize(vec);
  }
}
