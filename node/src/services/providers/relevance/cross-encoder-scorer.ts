// Cross-encoder relevance via the /rerank endpoint of a text-embeddings-inference server.
// raw_scores returns the model logits (ms-marco MiniLM range), which the quality thresholds assume.
import axios from 'axios';
import { z } from 'zod';
import type { RelevanceScorer } from '../retrieval-types';
import { CollaboratorError } from '@/utils/errors';
import type { HttpPoster } from '@/utils/http';

export interface CrossEncoderScorerOptions {
  url: string;
  timeoutMs?: number;
}

const rerankResponseSchema = z.array(z.object({ index: z.number().int(), score: z.number() }));

export class CrossEncoderScorer implements RelevanceScorer {
  private readonly http: HttpPoster;

  constructor(options: CrossEncoderScorerOptions, http?: HttpPoster) {
    this.http = http ?? axios.create({ baseURL: options.url, timeout: options.timeoutMs ?? 30_000 });
  }

  async score(query: string, text: string): Promise<number> {
    const [score] = await this.scoreMany(query, [text]);
    return score;
  }

  /** One /rerank call for the whole candidate set; results come back sorted by score, not input order. */
  async scoreMany(query: string, texts: string[]): Promise<number[]> {
    if (texts.length === 0) return [];

    const { data } = await this.http.post<unknown>('/rerank', {
      query,
      texts,
      raw_scores: true,
      truncate: true,
    });
    const parsed = rerankResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new CollaboratorError('relevance_scorer', 'Unexpected rerank response shape', {
        cause: parsed.error,
      });
    }

    const byIndex = new Map(parsed.data.map((r) => [r.index, r.score]));
    return texts.map((_, idx) => {
      const score = byIndex.get(idx);
      if (score === undefined) {
        throw new CollaboratorError('relevance_scorer', `Rerank response has no score for text ${idx}`);
      }
      return score;
    });
  }
}
