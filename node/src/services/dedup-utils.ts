// node/src/services/dedup-utils.ts

import type { Document } from '@/types/core';

/**
 * Collapse documents with identical content. A repeated key keeps its
 * first-seen position but takes the later document, so a later query's
 * relevance score replaces an earlier one.
 */
export function dedupByContent(documents: Iterable<Document>): Document[] {
  const byContent = new Map<string, Document>();
  for (const doc of documents) {
    byContent.set(doc.content, doc);
  }
  return Array.from(byContent.values());
}

/** Stable descending sort on relevanceScore; documents without one sort last. */
export function rankByRelevance(documents: Document[]): Document[] {
  const scoreOf = (d: Document) => d.metadata.relevanceScore ?? Number.NEGATIVE_INFINITY;
  return documents
    .map((doc, idx) => ({ doc, idx }))
    .sort((a, b) => {
      const sa = scoreOf(a.doc);
      const sb = scoreOf(b.doc);
      if (sa === sb) return a.idx - b.idx;
      return sb > sa ? 1 : -1;
    })
    .map(({ doc }) => doc);
}
