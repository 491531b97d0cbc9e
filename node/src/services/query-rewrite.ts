import type { LlmClient } from './llm-client';
import { buildRewritePrompt } from './prompt-templates';
import { InputError } from '@/utils/errors';
import { logger } from './logger';

export const MAX_REWRITTEN_QUERIES = 5;

const BULLET_PREFIX = /^[-•*]+\s*/;
const NUMBERED_PREFIX = /^\d+[.)]\s*/;

/** One query per line; list decoration and blank lines removed, exact duplicates dropped. */
export function parseRewrittenQueries(raw: string): string[] {
  const seen = new Set<string>();
  const out: string[] = [];

  for (const line of raw.split(/\r?\n/)) {
    const query = line.trim().replace(BULLET_PREFIX, '').replace(NUMBERED_PREFIX, '').trim();
    if (!query || seen.has(query)) continue;
    seen.add(query);
    out.push(query);
  }

  return out.slice(0, MAX_REWRITTEN_QUERIES);
}

/**
 * Expand a ticket into retrieval-oriented queries. May return an empty list;
 * falling back to the ticket text is the caller's decision.
 */
export async function rewriteTicket(ticket: string, llm: LlmClient): Promise<string[]> {
  const text = ticket.trim();
  if (!text) {
    throw new InputError('ticket_text must be non-empty');
  }

  const raw = await llm.complete(buildRewritePrompt(text));
  const queries = parseRewrittenQueries(raw);

  logger.info('rewrite:done', { queries: queries.length });
  return queries;
}
