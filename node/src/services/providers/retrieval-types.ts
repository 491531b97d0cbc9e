// Collaborator contracts for the retrieval layer
import type { Document } from '@/types/core';

/** Hybrid (dense + sparse) search over the pre-populated support knowledge base. */
export interface VectorIndex {
  search(query: string, k: number): Promise<Document[]>;
}

/** Pairwise relevance model; higher is more relevant, no fixed range. */
export interface RelevanceScorer {
  score(query: string, text: string): Promise<number>;
  /** Batched form: one score per text, in input order. */
  scoreMany?(query: string, texts: string[]): Promise<number[]>;
}
