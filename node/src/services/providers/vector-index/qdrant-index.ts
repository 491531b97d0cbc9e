// node/src/services/providers/vector-index/qdrant-index.ts
// Hybrid search against a Qdrant collection: dense prefetch (query embedding) + sparse prefetch
// (server-side BM25 inference), fused with reciprocal rank fusion by Qdrant's Query API.
import axios from 'axios';
import { z } from 'zod';
import type { Document } from '@/types/core';
import type { VectorIndex } from '../retrieval-types';
import type { Embedder } from '../retrieval-vector-utils';
import { chunkPayloadSchema, payloadToDocument } from './document-payload';
import { CollaboratorError } from '@/utils/errors';
import type { HttpPoster } from '@/utils/http';
import { logger } from '@/services/logger';

export interface QdrantIndexOptions {
  url: string;
  apiKey?: string;
  collection: string;
  /** Named dense vector; omitted for a collection with a single unnamed vector. */
  denseVector?: string;
  sparseVector: string;
  /** Sparse inference model understood by the Qdrant server. */
  sparseModel?: string;
  timeoutMs?: number;
}

const queryResponseSchema = z.object({
  result: z.object({
    points: z.array(
      z.object({
        id: z.union([z.string(), z.number()]),
        score: z.number().optional(),
        payload: z.unknown(),
      }),
    ),
  }),
});

export class QdrantVectorIndex implements VectorIndex {
  private readonly http: HttpPoster;

  constructor(
    private readonly embedder: Embedder,
    private readonly options: QdrantIndexOptions,
    http?: HttpPoster,
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: options.url,
        timeout: options.timeoutMs ?? 30_000,
        headers: options.apiKey ? { 'api-key': options.apiKey } : undefined,
      });
  }

  async search(query: string, k: number): Promise<Document[]> {
    const dense = await this.embedder.embed(query);
    const body = {
      prefetch: [
        {
          query: dense,
          ...(this.options.denseVector && { using: this.options.denseVector }),
          limit: k,
        },
        {
          query: { text: query, model: this.options.sparseModel ?? 'qdrant/bm25' },
          using: this.options.sparseVector,
          limit: k,
        },
      ],
      query: { fusion: 'rrf' },
      limit: k,
      with_payload: true,
    };

    const { data } = await this.http.post<unknown>(
      `/collections/${encodeURIComponent(this.options.collection)}/points/query`,
      body,
    );

    const parsed = queryResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new CollaboratorError('vector_index', 'Unexpected Qdrant query response shape', {
        cause: parsed.error,
      });
    }

    const documents: Document[] = [];
    for (const point of parsed.data.result.points) {
      const payload = chunkPayloadSchema.safeParse(point.payload);
      if (!payload.success) {
        logger.warn('qdrant:skip_point', { id: point.id, issues: payload.error.errors.length });
        continue;
      }
      documents.push(payloadToDocument(payload.data));
    }
    return documents;
  }
}
