// src/types/core.ts

export const ACTION_LABELS = [
  'none',
  'customer_action_required',
  'follow_up_required',
  'escalate_to_support',
  'escalate_to_abuse_team',
  'escalate_to_billing',
  'escalate_to_technical',
] as const;

export type ActionRequired = (typeof ACTION_LABELS)[number];

/** Classifier-only sentinel; mapped to 'none' before a Response is built. */
export type InferredAction = ActionRequired | 'no_action';

export interface DocumentMetadata {
  category?: string;
  sourceFile?: string;
  section?: string;
  subsection?: string;
  chunkId?: number;
  /** Set by the reranker; always finite when present. */
  relevanceScore?: number;
}

/** Retrieved evidence unit. Two documents are the same document when their content is identical. */
export interface Document {
  content: string;
  metadata: DocumentMetadata;
}

export interface RetrievalResult {
  documents: Document[];
  /** Index-aligned with documents, descending. */
  scores: number[];
}

export type RetrievalQuality = 'good' | 'partially_good' | 'poor';

export interface QualityAssessment {
  quality: RetrievalQuality;
  avgScore: number;
  topScore: number;
  scoreGap: number;
  numResults: number;
  categoriesCovered: string[];
  reason?: string;
}

export interface ActionDecision {
  action: InferredAction;
  confidence: number;
}

/** Externally-facing contract. */
export interface TicketResponse {
  answer: string;
  references: string[];
  action_required: ActionRequired;
}

export interface QueryTrace {
  query: string;
  documents: Document[];
  assessment: QualityAssessment;
}

/** Inspection data produced alongside a response; never sent to API callers. */
export interface ResolutionDiagnostics {
  rewrittenQueries: string[];
  queryTraces: QueryTrace[];
  finalDocuments: Document[];
  retrievalQuality: QualityAssessment;
  actionDecision: ActionDecision;
  safetyOverrideApplied: boolean;
}

export interface ResolutionResult {
  response: TicketResponse;
  diagnostics: ResolutionDiagnostics;
}
