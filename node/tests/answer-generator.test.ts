import { describe, it, expect } from 'vitest';
import { buildContext, extractAnswer, generateAnswer } from '@/services/answer-generator';
import { NO_CONTEXT_FALLBACK } from '@/services/prompt-templates';
import { GenerationFormatError, InputError } from '@/utils/errors';
import { doc, ScriptedLlm } from './helpers/fakes';

function formatFailure(raw: string): GenerationFormatError {
  try {
    extractAnswer(raw);
  } catch (err) {
    if (err instanceof GenerationFormatError) return err;
    throw err;
  }
  throw new Error('expected extractAnswer to throw');
}

describe('extractAnswer', () => {
  it('returns the trimmed answer field', () => {
    expect(extractAnswer('{"answer": "  Verify your email.  "}')).toBe('Verify your email.');
  });

  it('accepts output wrapped in a markdown fence', () => {
    expect(extractAnswer('```json\n{"answer": "Hi"}\n```')).toBe('Hi');
  });

  it('fails with invalid_json on unparseable output', () => {
    expect(formatFailure('Sure! Here is the answer').reason).toBe('invalid_json');
  });

  it('fails with missing_answer when the key is absent', () => {
    expect(formatFailure('{"reply": "x"}').reason).toBe('missing_answer');
  });

  it('fails with missing_answer when the value is not a string', () => {
    expect(formatFailure('{"answer": 3}').reason).toBe('missing_answer');
    expect(formatFailure('["answer"]').reason).toBe('missing_answer');
  });
});

describe('buildContext', () => {
  it('joins trimmed contents with blank lines', () => {
    expect(buildContext([doc('  first chunk '), doc('second chunk')])).toBe(
      'first chunk\n\nsecond chunk',
    );
  });

  it('falls back when there are no documents', () => {
    expect(buildContext([])).toBe(NO_CONTEXT_FALLBACK);
  });
});

describe('generateAnswer', () => {
  it('grounds the prompt in the documents and returns the answer', async () => {
    const llm = new ScriptedLlm(() => '{"answer": "Refunds apply within 5 days."}');

    const answer = await generateAnswer(
      'Can I get a refund?',
      [doc('Refunds for new registrations are available within 5 days.')],
      llm,
    );

    expect(answer).toBe('Refunds apply within 5 days.');
    expect(llm.prompts[0]).toContain(
      'Ticket:\nCan I get a refund?\n\nContext:\nRefunds for new registrations are available within 5 days.\n',
    );
  });

  it('uses the fallback context when nothing was retrieved', async () => {
    const llm = new ScriptedLlm(() => '{"answer": "I don\'t know."}');

    await generateAnswer('Where is my invoice?', [], llm);

    expect(llm.prompts[0]).toContain(`Context:\n${NO_CONTEXT_FALLBACK}\n`);
  });

  it('propagates a format error', async () => {
    const llm = new ScriptedLlm(() => 'not json');

    await expect(generateAnswer('Where is my invoice?', [], llm)).rejects.toBeInstanceOf(
      GenerationFormatError,
    );
  });

  it('rejects a blank ticket', async () => {
    const llm = new ScriptedLlm(() => '{"answer": "x"}');

    await expect(generateAnswer('  ', [], llm)).rejects.toBeInstanceOf(InputError);
    expect(llm.prompts).toEqual([]);
  });
});
