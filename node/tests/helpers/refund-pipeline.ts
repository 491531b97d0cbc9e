/**
 * A one-document pipeline wired from fakes: any ticket rewrites to
 * "refund eligibility", retrieves the refund policy and resolves to a billing escalation.
 */
import type { OrchestratorDeps } from '@/services/orchestrator';
import { ActionClassifier } from '@/services/action-classifier';
import { HybridRetriever } from '@/services/retrieval/hybrid-retriever';
import { Reranker } from '@/services/rerank';
import { doc, ScriptedLlm, StaticIndex, TableEmbedder, TableScorer } from './fakes';

export const REFUND_ANSWER = 'Billing will review the refund.';
export const REFUND_REFERENCE = 'billing: Refund Policy | file=billing/refund_policy.md';

const refundPolicy = doc('Refunds for new registrations are available within 5 days.', {
  category: 'billing',
  section: 'Refund Policy',
  sourceFile: 'billing/refund_policy.md',
});

export function refundLlm(answerJson = JSON.stringify({ answer: REFUND_ANSWER })): ScriptedLlm {
  return new ScriptedLlm((prompt) => (prompt.includes('Queries:') ? 'refund eligibility' : answerJson));
}

export async function refundDeps(llm: ScriptedLlm = refundLlm()): Promise<OrchestratorDeps> {
  const embedder = new TableEmbedder(
    new Map([
      ['refund request', [1, 0]],
      [REFUND_ANSWER, [1, 0]],
    ]),
    [0, 0],
  );
  return {
    llm,
    retriever: new HybridRetriever(
      new StaticIndex(new Map([['refund eligibility', [refundPolicy]]])),
    ),
    reranker: new Reranker(new TableScorer(new Map([[refundPolicy.content, 6]]))),
    actionClassifier: await ActionClassifier.create(embedder, [
      { action: 'escalate_to_billing', phrases: ['refund request'] },
    ]),
  };
}
