/**
 * Deterministic follow-up action from the generated answer: the answer is
 * embedded and matched against per-action exemplar phrases by cosine
 * similarity (dot product of unit vectors).
 *
 * Exemplar vectors are computed once in {@link ActionClassifier.create} and
 * frozen; one instance is shared by every request for the process lifetime.
 */
import type { ActionDecision, ActionRequired } from '@/types/core';
import type { Embedder, Embedding } from './providers/retrieval-vector-utils';
import { dot, normalize } from './providers/retrieval-vector-utils';
import { ACTION_PROTOTYPES, type ActionPrototypes } from './action-prototypes';
import { clamp, round3 } from '@/utils/numbers';
import { CollaboratorError } from '@/utils/errors';
import { logger } from './logger';

export const DEFAULT_ACTION_THRESHOLD = 0.5;

interface PrototypeGroup {
  action: ActionRequired;
  vectors: ReadonlyArray<Readonly<Embedding>>;
}

export class ActionClassifier {
  private constructor(
    private readonly embedder: Embedder,
    private readonly groups: readonly PrototypeGroup[],
    private readonly dimension: number | undefined,
  ) {}

  static async create(
    embedder: Embedder,
    prototypes: ActionPrototypes = ACTION_PROTOTYPES,
  ): Promise<ActionClassifier> {
    const groups = await Promise.all(
      prototypes.map(async ({ action, phrases }): Promise<PrototypeGroup> => {
        const vectors = await Promise.all(phrases.map((p) => embedder.embed(p)));
        return Object.freeze({
          action,
          vectors: Object.freeze(vectors.map((v) => Object.freeze(normalize(v)))),
        });
      }),
    );

    const dimensions = new Set(groups.flatMap((g) => g.vectors.map((v) => v.length)));
    if (dimensions.size > 1) {
      throw new CollaboratorError(
        'embedder',
        `Prototype embeddings disagree on dimension: ${[...dimensions].join(', ')}`,
      );
    }
    const dimension = dimensions.size === 1 ? [...dimensions][0] : undefined;

    logger.info('action:prototypes_ready', {
      actions: groups.length,
      phrases: groups.reduce((s, g) => s + g.vectors.length, 0),
      dimension,
    });
    return new ActionClassifier(embedder, Object.freeze(groups), dimension);
  }

  get actions(): ActionRequired[] {
    return this.groups.map((g) => g.action);
  }

  async infer(answer: string, threshold = DEFAULT_ACTION_THRESHOLD): Promise<ActionDecision> {
    if (!answer.trim()) {
      return { action: 'no_action', confidence: 0 };
    }

    const answerVec = normalize(await this.embedder.embed(answer));
    if (this.dimension !== undefined && answerVec.length !== this.dimension) {
      throw new CollaboratorError(
        'embedder',
        `Answer embedding has dimension ${answerVec.length}, prototypes have ${this.dimension}`,
      );
    }

    let bestAction: ActionRequired | undefined;
    let bestScore = 0;
    for (const group of this.groups) {
      for (const vec of group.vectors) {
        const sim = dot(vec, answerVec);
        if (sim > bestScore) {
          bestScore = sim;
          bestAction = group.action;
        }
      }
    }

    const confidence = round3(clamp(bestScore, 0, 1));
    const decision: ActionDecision =
      bestAction === undefined || bestScore < threshold
        ? { action: 'no_action', confidence }
        : { action: bestAction, confidence };

    logger.debug('action:inferred', decision);
    return decision;
  }
}
