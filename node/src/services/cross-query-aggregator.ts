// src/services/cross-query-aggregator.ts
// Fan out retrieve → rerank → evaluate per rewritten query, then merge into one ranked pool
// and one aggregate quality verdict.
import type { Document, QualityAssessment, QueryTrace } from '@/types/core';
import type { HybridRetriever } from './retrieval/hybrid-retriever';
import { DEFAULT_INITIAL_K } from './retrieval/hybrid-retriever';
import type { Reranker } from './rerank';
import { DEFAULT_RERANK_TOP_K } from './rerank';
import { evaluateRetrieval } from './retrieval-quality';
import { dedupByContent, rankByRelevance } from './dedup-utils';
import { logger } from './logger';

export const DEFAULT_FINAL_K = 4;

export interface RetrievalStages {
  retriever: HybridRetriever;
  reranker: Reranker;
}

export interface AggregationOptions {
  initialK?: number;
  rerankTopK?: number;
  finalK?: number;
}

export interface AggregatedRetrieval {
  documents: Document[];
  assessment: QualityAssessment;
  traces: QueryTrace[];
}

const INITIAL_BEST: QualityAssessment = {
  quality: 'poor',
  avgScore: 0,
  topScore: 0,
  scoreGap: 0,
  numResults: 0,
  categoriesCovered: [],
};

/**
 * Fold per-query verdicts in query order. `good` always replaces the current
 * best, so the last good one wins. `partially_good` replaces the best only
 * while it is still `poor`, so the first partially-good one wins. `poor`
 * never replaces.
 */
export function aggregateQuality(assessments: QualityAssessment[]): QualityAssessment {
  let best: QualityAssessment = INITIAL_BEST;
  for (const a of assessments) {
    if (a.quality === 'good') {
      best = a;
    } else if (a.quality === 'partially_good' && best.quality === 'poor') {
      best = a;
    }
  }
  return { ...best, categoriesCovered: [...best.categoriesCovered] };
}

export async function runQuery(
  query: string,
  stages: RetrievalStages,
  options: AggregationOptions = {},
): Promise<QueryTrace> {
  const candidates = await stages.retriever.retrieve(query, options.initialK ?? DEFAULT_INITIAL_K);
  const { documents, scores } = await stages.reranker.rerank(
    query,
    candidates,
    options.rerankTopK ?? DEFAULT_RERANK_TOP_K,
  );
  const assessment = evaluateRetrieval(scores, documents);

  logger.debug('retrieval:query_done', {
    query: query.slice(0, 100),
    candidates: candidates.length,
    kept: documents.length,
    quality: assessment.quality,
    topScore: assessment.topScore,
  });

  return { query, documents, assessment };
}

export async function aggregateAcrossQueries(
  queries: string[],
  stages: RetrievalStages,
  options: AggregationOptions = {},
): Promise<AggregatedRetrieval> {
  // Promise.all keeps input order, which the quality fold depends on.
  const traces = await Promise.all(queries.map((q) => runQuery(q, stages, options)));

  const pool = dedupByContent(traces.flatMap((t) => t.documents));
  const documents = rankByRelevance(pool).slice(0, options.finalK ?? DEFAULT_FINAL_K);
  const assessment = aggregateQuality(traces.map((t) => t.assessment));

  logger.info('aggregate:done', {
    queries: queries.length,
    pooled: pool.length,
    final: documents.length,
    quality: assessment.quality,
  });

  return { documents, assessment, traces };
}
