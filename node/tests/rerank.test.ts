import { describe, it, expect } from 'vitest';
import { Reranker } from '@/services/rerank';
import { CollaboratorError } from '@/utils/errors';
import type { RelevanceScorer } from '@/services/providers/retrieval-types';
import { doc, TableScorer } from './helpers/fakes';

/** Batch-capable scorer; the per-pair path must not be used when the batch path exists. */
class BatchScorer implements RelevanceScorer {
  readonly batches: string[][] = [];

  constructor(private readonly scores: number[]) {}

  async score(): Promise<number> {
    throw new Error('per-pair scoring should not be used');
  }

  async scoreMany(_query: string, texts: string[]): Promise<number[]> {
    this.batches.push(texts);
    return this.scores;
  }
}

const a = doc('alpha', { category: 'faqs' });
const b = doc('bravo', { category: 'billing' });
const c = doc('charlie', { category: 'policies' });
const d = doc('delta', { category: 'faqs' });

const scorer = () =>
  new TableScorer(
    new Map([
      ['alpha', 1.0],
      ['bravo', 5.0],
      ['charlie', 3.0],
      ['delta', 5.0],
    ]),
  );

describe('Reranker', () => {
  it('orders by score descending, keeps retrieval order on ties and truncates to topK', async () => {
    const result = await new Reranker(scorer()).rerank('q', [a, b, c, d], 3);

    expect(result.scores).toEqual([5, 5, 3]);
    expect(result.documents.map((x) => x.content)).toEqual(['bravo', 'delta', 'charlie']);
    expect(result.documents[0].metadata).toEqual({ category: 'billing', relevanceScore: 5 });
  });

  it('does not mutate the candidates', async () => {
    await new Reranker(scorer()).rerank('q', [a, b], 2);

    expect(a.metadata).toEqual({ category: 'faqs' });
    expect(b.metadata).toEqual({ category: 'billing' });
  });

  it('is deterministic across runs', async () => {
    const reranker = new Reranker(scorer());

    const first = await reranker.rerank('q', [a, b, c, d], 4);
    const second = await reranker.rerank('q', [a, b, c, d], 4);

    expect(second).toEqual(first);
  });

  it('is idempotent when applied to its own output', async () => {
    const reranker = new Reranker(scorer());

    const once = await reranker.rerank('q', [c, a, d, b], 4);
    const twice = await reranker.rerank('q', once.documents, 4);

    expect(twice.documents.map((x) => x.content)).toEqual(once.documents.map((x) => x.content));
    expect(twice.scores).toEqual(once.scores);
  });

  it('returns empty results without scoring when there are no candidates', async () => {
    const s = scorer();

    const result = await new Reranker(s).rerank('q', []);

    expect(result).toEqual({ documents: [], scores: [] });
    expect(s.calls).toBe(0);
  });

  it('keeps every candidate when topK exceeds the candidate count', async () => {
    const result = await new Reranker(scorer()).rerank('q', [a, c], 10);

    expect(result.scores).toEqual([3, 1]);
  });

  it('rejects a non-finite score', async () => {
    const s = new TableScorer(new Map([['alpha', Number.NaN]]));

    await expect(new Reranker(s).rerank('q', [a])).rejects.toBeInstanceOf(CollaboratorError);
  });

  it('scores the whole candidate set in one batch when the scorer supports it', async () => {
    const s = new BatchScorer([1, 5, 3]);

    const result = await new Reranker(s).rerank('q', [a, b, c], 2);

    expect(s.batches).toEqual([['alpha', 'bravo', 'charlie']]);
    expect(result.documents.map((x) => x.content)).toEqual(['bravo', 'charlie']);
    expect(result.scores).toEqual([5, 3]);
  });

  it('rejects a batch with the wrong number of scores', async () => {
    await expect(new Reranker(new BatchScorer([1])).rerank('q', [a, b])).rejects.toBeInstanceOf(
      CollaboratorError,
    );
  });
});
