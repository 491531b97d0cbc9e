// node/src/services/providers/embeddings/openai-embedder.ts

import OpenAI from 'openai';
import type { Embedder, Embedding } from '../retrieval-vector-utils';
import { normalize } from '../retrieval-vector-utils';
import { CollaboratorError } from '@/utils/errors';

export interface OpenAIEmbedderConfig {
  apiKey: string;
  /** e.g. 'text-embedding-3-small', 'text-embedding-3-large' */
  model: string;
  timeoutMs?: number;
}

export class OpenAIEmbedder implements Embedder {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(config: OpenAIEmbedderConfig, client?: OpenAI) {
    this.client = client ?? new OpenAI({ apiKey: config.apiKey, timeout: config.timeoutMs });
    this.model = config.model;
  }

  async embed(text: string): Promise<Embedding> {
    const res = await this.client.embeddings.create({ model: this.model, input: text });
    const vector = res.data[0]?.embedding;
    if (!vector || vector.length === 0) {
      throw new CollaboratorError('embedder', `Empty embedding returned by ${this.model}`);
    }
    return normalize(vector);
  }
}
