// node/src/services/rerank.ts

import type { Document, RetrievalResult } from '@/types/core';
import type { RelevanceScorer } from '@/services/providers/retrieval-types';
import { CollaboratorError } from '@/utils/errors';

export const DEFAULT_RERANK_TOP_K = 4;

/**
 * Second-pass pairwise scoring of a small candidate set. Kept documents are
 * copies carrying `relevanceScore`; the input documents are not mutated.
 */
export class Reranker {
  constructor(private readonly scorer: RelevanceScorer) {}

  async rerank(
    query: string,
    candidates: Document[],
    topK = DEFAULT_RERANK_TOP_K,
  ): Promise<RetrievalResult> {
    if (!candidates.length) return { documents: [], scores: [] };

    const texts = candidates.map((d) => d.content);
    const scores = this.scorer.scoreMany
      ? await this.scorer.scoreMany(query, texts)
      : await Promise.all(texts.map((t) => this.scorer.score(query, t)));
    if (scores.length !== candidates.length) {
      throw new CollaboratorError(
        'relevance_scorer',
        `Expected ${candidates.length} scores, got ${scores.length}`,
      );
    }

    const scored = candidates.map((doc, idx) => {
      const score = scores[idx];
      if (!Number.isFinite(score)) {
        throw new CollaboratorError('relevance_scorer', `Non-finite relevance score for candidate ${idx}`);
      }
      return { doc, score };
    });

    // Array#sort is stable: equal scores keep retrieval order.
    scored.sort((a, b) => b.score - a.score);
    const kept = scored.slice(0, Math.max(0, topK));

    return {
      documents: kept.map(({ doc, score }) => ({
        content: doc.content,
        metadata: { ...doc.metadata, relevanceScore: score },
      })),
      scores: kept.map((s) => s.score),
    };
  }
}
