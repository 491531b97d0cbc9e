// src/services/retrieval-quality.ts
// Weakly-supervised retrieval quality from reranker score statistics.
// Thresholds are calibrated against ms-marco MiniLM cross-encoder logits.
import type { Document, QualityAssessment, RetrievalQuality } from '@/types/core';
import { round3 } from '@/utils/numbers';

export const GOOD_TOP_SCORE = 4.0;
export const GOOD_SCORE_GAP = 0.6;
export const PARTIAL_TOP_SCORE = 3.0;

export const NO_DOCUMENTS_REASON = 'no_documents_retrieved';

export function classifyScores(topScore: number, scoreGap: number): RetrievalQuality {
  if (topScore > GOOD_TOP_SCORE && scoreGap > GOOD_SCORE_GAP) return 'good';
  if (topScore > PARTIAL_TOP_SCORE) return 'partially_good';
  return 'poor';
}

/** `scores` must be descending and index-aligned with `documents`. */
export function evaluateRetrieval(scores: number[], documents: Document[]): QualityAssessment {
  if (!scores.length) {
    return {
      quality: 'poor',
      avgScore: 0,
      topScore: 0,
      scoreGap: 0,
      numResults: 0,
      categoriesCovered: [],
      reason: NO_DOCUMENTS_REASON,
    };
  }

  const avgScore = scores.reduce((s, x) => s + x, 0) / scores.length;
  const topScore = scores[0];
  const scoreGap = scores.length > 1 ? scores[0] - scores[1] : scores[0];

  const categories = new Set(documents.map((d) => d.metadata.category ?? 'unknown'));

  return {
    quality: classifyScores(topScore, scoreGap),
    avgScore: round3(avgScore),
    topScore: round3(topScore),
    scoreGap: round3(scoreGap),
    numResults: documents.length,
    categoriesCovered: [...categories].sort(),
  };
}
