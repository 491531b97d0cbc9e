// Grounded answer generation under a strict {"answer": string} output contract.
import type { Document } from '@/types/core';
import type { LlmClient } from './llm-client';
import { buildAnswerPrompt, NO_CONTEXT_FALLBACK } from './prompt-templates';
import { isJsonObject, parseJsonOutput } from './safe-parse-json';
import { GenerationFormatError, InputError } from '@/utils/errors';
import { logger } from './logger';

export const ANSWER_KEY = 'answer';

export function buildContext(documents: Document[]): string {
  const context = documents.map((d) => d.content.trim()).join('\n\n');
  return context || NO_CONTEXT_FALLBACK;
}

/**
 * Two-step read of the model output: structural parse, then the answer field.
 * Each step fails with its own GenerationFormatError reason.
 */
export function extractAnswer(raw: string): string {
  const parsed = parseJsonOutput(raw);
  if (!parsed.ok) {
    logger.warn('generation:format_error', { reason: 'invalid_json', raw: parsed.raw });
    throw new GenerationFormatError('invalid_json', `LLM did not return valid JSON: ${parsed.error}`);
  }

  const answer = isJsonObject(parsed.value) ? parsed.value[ANSWER_KEY] : undefined;
  if (typeof answer !== 'string') {
    logger.warn('generation:format_error', { reason: 'missing_answer' });
    throw new GenerationFormatError('missing_answer', `LLM JSON has no string \`${ANSWER_KEY}\``);
  }
  return answer.trim();
}

export async function generateAnswer(
  ticket: string,
  documents: Document[],
  llm: LlmClient,
): Promise<string> {
  const text = ticket.trim();
  if (!text) {
    throw new InputError('ticket_text must be non-empty');
  }

  const prompt = buildAnswerPrompt({ ticket: text, context: buildContext(documents) });
  const raw = await llm.complete(prompt);
  const answer = extractAnswer(raw);

  logger.info('generation:done', { contextDocs: documents.length, answerLength: answer.length });
  return answer;
}
