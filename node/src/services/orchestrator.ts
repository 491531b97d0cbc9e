// node/src/services/orchestrator.ts
// Ticket → rewrite → {retrieve → rerank → evaluate}* → aggregate → generate →
// references + action → safety override → validate.
import type {
  ActionRequired,
  InferredAction,
  ResolutionResult,
  RetrievalQuality,
  TicketResponse,
} from '@/types/core';
import type { LlmClient } from './llm-client';
import type { HybridRetriever } from './retrieval/hybrid-retriever';
import type { Reranker } from './rerank';
import type { ActionClassifier } from './action-classifier';
import { rewriteTicket } from './query-rewrite';
import { aggregateAcrossQueries, type AggregationOptions } from './cross-query-aggregator';
import { generateAnswer } from './answer-generator';
import { DEFAULT_REFERENCE_COUNT, selectTopReferences } from './references';
import { validateResponse } from './response-validator';
import { InputError } from '@/utils/errors';
import { logger, previewText } from './logger';

export interface PipelineSettings extends AggregationOptions {
  actionThreshold?: number;
  referenceCount?: number;
}

export interface OrchestratorDeps {
  llm: LlmClient;
  retriever: HybridRetriever;
  reranker: Reranker;
  actionClassifier: ActionClassifier;
  settings?: PipelineSettings;
}

export function normalizeAction(action: InferredAction): ActionRequired {
  return action === 'no_action' ? 'none' : action;
}

/** Weak evidence must not end in a silent "no action": a human follows up instead. */
export function applySafetyOverride(
  action: ActionRequired,
  quality: RetrievalQuality,
): ActionRequired {
  if (quality === 'poor' && action === 'none') return 'follow_up_required';
  return action;
}

export async function resolveTicket(
  ticketText: string,
  deps: OrchestratorDeps,
): Promise<ResolutionResult> {
  const ticket = ticketText.trim();
  if (!ticket) {
    throw new InputError('ticket_text must be non-empty');
  }
  const settings = deps.settings ?? {};
  const startedAt = Date.now();

  logger.info('ticket:received', previewText(ticket));

  const rewritten = await rewriteTicket(ticket, deps.llm);
  const queries = rewritten.length > 0 ? rewritten : [ticket];
  if (rewritten.length === 0) {
    logger.warn('rewrite:empty_fallback', { using: 'ticket_text' });
  }

  const aggregated = await aggregateAcrossQueries(
    queries,
    { retriever: deps.retriever, reranker: deps.reranker },
    settings,
  );

  const answer = await generateAnswer(ticket, aggregated.documents, deps.llm);
  const references = selectTopReferences(
    aggregated.documents,
    settings.referenceCount ?? DEFAULT_REFERENCE_COUNT,
  );
  const actionDecision = await deps.actionClassifier.infer(answer, settings.actionThreshold);

  const inferred = normalizeAction(actionDecision.action);
  const actionRequired = applySafetyOverride(inferred, aggregated.assessment.quality);
  const safetyOverrideApplied = actionRequired !== inferred;
  if (safetyOverrideApplied) {
    logger.info('safety:override_applied', { from: inferred, to: actionRequired });
  }

  const response = validateResponse({
    answer,
    references,
    action_required: actionRequired,
  });

  logger.info('ticket:resolved', {
    durationMs: Date.now() - startedAt,
    queries: queries.length,
    quality: aggregated.assessment.quality,
    answerLength: response.answer.length,
    references: response.references.length,
    action: response.action_required,
    confidence: actionDecision.confidence,
  });

  return {
    response,
    diagnostics: {
      rewrittenQueries: queries,
      queryTraces: aggregated.traces,
      finalDocuments: aggregated.documents,
      retrievalQuality: aggregated.assessment,
      actionDecision,
      safetyOverrideApplied,
    },
  };
}

/** The only shape allowed across the HTTP boundary; diagnostics never leave the process. */
export function toExternalResponse(result: ResolutionResult): TicketResponse {
  const { answer, references, action_required } = result.response;
  return validateResponse({ answer, references, action_required });
}
