// LLM-as-reranker: the generation backend rates one (query, passage) pair on a 0–10 scale.
// Scores are not calibrated to cross-encoder logits, so the 3.0/4.0 quality cut-offs only roughly apply.
import type { RelevanceScorer } from '../retrieval-types';
import type { LlmClient } from '@/services/llm-client';
import { isJsonObject, parseJsonOutput } from '@/services/safe-parse-json';
import { CollaboratorError } from '@/utils/errors';

const MAX_PASSAGE_CHARS = 2000;

export function buildRelevancePrompt(query: string, text: string): string {
  return `
You are a ranking model for a customer support knowledge base.

Search query: ${JSON.stringify(query)}

Passage:
"""${text.slice(0, MAX_PASSAGE_CHARS)}"""

Rate how well the passage answers the query on a scale from 0 (unrelated) to 10 (directly answers it).

Return JSON only in the format:
{ "score": number }
`;
}

export class LlmRelevanceScorer implements RelevanceScorer {
  constructor(private readonly llm: LlmClient) {}

  async score(query: string, text: string): Promise<number> {
    const raw = await this.llm.complete(buildRelevancePrompt(query, text));
    const parsed = parseJsonOutput(raw);
    if (!parsed.ok || !isJsonObject(parsed.value) || typeof parsed.value.score !== 'number') {
      throw new CollaboratorError('relevance_scorer', 'LLM scorer did not return {"score": number}');
    }
    return Math.max(0, Math.min(10, parsed.value.score));
  }
}
