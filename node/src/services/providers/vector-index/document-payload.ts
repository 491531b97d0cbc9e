// Wire layout of indexed chunks ({page_content, metadata}) as written by the ingestion job.
import { z } from 'zod';
import type { Document } from '@/types/core';

const metadataSchema = z
  .object({
    category: z.string().optional(),
    source_file: z.string().optional(),
    section: z.string().optional(),
    subsection: z.string().nullish(),
    chunk_id: z.number().int().optional(),
    relevance_score: z.number().finite().optional(),
  })
  .passthrough();

export const chunkPayloadSchema = z.object({
  page_content: z.string(),
  metadata: metadataSchema.default({}),
});

export type ChunkPayload = z.infer<typeof chunkPayloadSchema>;

export function payloadToDocument(payload: ChunkPayload): Document {
  const m = payload.metadata;
  return {
    content: payload.page_content,
    metadata: {
      ...(m.category !== undefined && { category: m.category }),
      ...(m.source_file !== undefined && { sourceFile: m.source_file }),
      ...(m.section !== undefined && { section: m.section }),
      ...(m.subsection != null && m.subsection !== '' && { subsection: m.subsection }),
      ...(m.chunk_id !== undefined && { chunkId: m.chunk_id }),
      ...(m.relevance_score !== undefined && { relevanceScore: m.relevance_score }),
    },
  };
}
