// First-pass candidate fetch. Dense/sparse fusion is the index's job; this only validates and delegates.
import type { Document } from '@/types/core';
import type { VectorIndex } from '@/services/providers/retrieval-types';
import { InputError } from '@/utils/errors';

export const DEFAULT_INITIAL_K = 6;

export class HybridRetriever {
  constructor(private readonly index: VectorIndex) {}

  async retrieve(query: string, initialK = DEFAULT_INITIAL_K): Promise<Document[]> {
    const q = query.trim();
    if (!q) {
      throw new InputError('Query must be a non-empty string');
    }
    return this.index.search(q, initialK);
  }
}
