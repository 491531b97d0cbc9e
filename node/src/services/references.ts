// Human-readable citations from final-document metadata.
import type { Document } from '@/types/core';

export const DEFAULT_REFERENCE_COUNT = 3;

/** "{category}: {section}[ | § {subsection}] | file={sourceFile}" */
export function formatReference(doc: Document): string {
  const { category = 'unknown', section = 'Unknown Doc', subsection, sourceFile = 'unknown_file' } =
    doc.metadata;

  const parts = [`${category}: ${section}`];
  if (subsection) {
    parts.push(`§ ${subsection}`);
  }
  parts.push(`file=${sourceFile}`);

  return parts.join(' | ');
}

/** First k documents in the order given; never padded. */
export function selectTopReferences(documents: Document[], k = DEFAULT_REFERENCE_COUNT): string[] {
  return documents.slice(0, Math.max(0, k)).map(formatReference);
}
