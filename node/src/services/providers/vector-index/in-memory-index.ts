// Hybrid retriever over an in-process knowledge base: BM25-like + dense (embedding) scoring.
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { Document } from '@/types/core';
import type { VectorIndex } from '../retrieval-types';
import type { Embedder, Embedding } from '../retrieval-vector-utils';
import { bm25LikeScore, cosineSimilarity, tokenize } from '../retrieval-vector-utils';
import { chunkPayloadSchema, payloadToDocument } from './document-payload';
import { logger } from '@/services/logger';

export interface InMemoryIndexOptions {
  bm25Weight?: number;
  denseWeight?: number;
}

interface IndexedChunk {
  document: Document;
  tokens: string[];
  embedding: Embedding;
}

const knowledgeBaseSchema = z.array(chunkPayloadSchema);

export class InMemoryVectorIndex implements VectorIndex {
  private readonly bm25Weight: number;
  private readonly denseWeight: number;
  private readonly avgDocLength: number;

  private constructor(
    private readonly embedder: Embedder,
    private readonly chunks: readonly IndexedChunk[],
    options: InMemoryIndexOptions,
  ) {
    this.bm25Weight = options.bm25Weight ?? 0.6;
    this.denseWeight = options.denseWeight ?? 0.4;
    this.avgDocLength =
      chunks.reduce((s, c) => s + c.tokens.length, 0) / Math.max(chunks.length, 1);
  }

  get size(): number {
    return this.chunks.length;
  }

  /** Blank and duplicate-content chunks are dropped (first occurrence kept). */
  static async fromDocuments(
    documents: Document[],
    embedder: Embedder,
    options: InMemoryIndexOptions = {},
  ): Promise<InMemoryVectorIndex> {
    const seen = new Set<string>();
    const unique: Document[] = [];
    for (const doc of documents) {
      const content = doc.content.trim();
      if (!content || seen.has(content)) continue;
      seen.add(content);
      unique.push({ content, metadata: { ...doc.metadata } });
    }

    const embeddings = await Promise.all(unique.map((d) => embedder.embed(d.content)));
    const chunks = unique.map((document, i) => ({
      document,
      tokens: tokenize(document.content),
      embedding: embeddings[i],
    }));
    return new InMemoryVectorIndex(embedder, Object.freeze(chunks), options);
  }

  static async fromFile(
    filePath: string,
    embedder: Embedder,
    options: InMemoryIndexOptions = {},
  ): Promise<InMemoryVectorIndex> {
    const resolved = path.resolve(process.cwd(), filePath);
    const raw: unknown = JSON.parse(await readFile(resolved, 'utf8'));
    const payloads = knowledgeBaseSchema.parse(raw);
    const index = await InMemoryVectorIndex.fromDocuments(
      payloads.map(payloadToDocument),
      embedder,
      options,
    );
    logger.info('memory-index:loaded', { path: resolved, chunks: index.size });
    return index;
  }

  async search(query: string, k: number): Promise<Document[]> {
    if (this.chunks.length === 0 || k <= 0) return [];

    const queryTokens = tokenize(query);
    const queryEmbedding = await this.embedder.embed(query);

    const scored = this.chunks.map((chunk) => {
      const bm25 = bm25LikeScore(queryTokens, chunk.tokens, this.avgDocLength);
      const dense = cosineSimilarity(queryEmbedding, chunk.embedding);
      const bm25Norm = Math.min(1, bm25 / 10);
      return {
        chunk,
        score: this.bm25Weight * bm25Norm + this.denseWeight * Math.max(0, dense),
      };
    });

    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, k).map(({ chunk }) => ({
      content: chunk.document.content,
      metadata: { ...chunk.document.metadata },
    }));
  }
}
