import { describe, it, expect } from 'vitest';
import { handleResolveTicket, RESOLVE_FAILED_MESSAGE } from '@/routes/tickets';
import { validateTicketRequest } from '@/validation/ticket-request';
import { refundDeps, refundLlm, REFUND_ANSWER, REFUND_REFERENCE } from './helpers/refund-pipeline';

describe('validateTicketRequest', () => {
  it('accepts a ticket within bounds', () => {
    expect(validateTicketRequest({ ticket_text: 'Please refund me' })).toEqual({
      success: true,
      data: { ticket_text: 'Please refund me' },
    });
  });

  it('reports a missing ticket_text', () => {
    expect(validateTicketRequest({})).toEqual({
      success: false,
      error: [{ path: 'ticket_text', message: 'ticket_text is required' }],
    });
  });

  it('enforces length bounds', () => {
    expect(validateTicketRequest({ ticket_text: 'hey' })).toEqual({
      success: false,
      error: [{ path: 'ticket_text', message: 'ticket_text must be at least 5 characters' }],
    });
    expect(validateTicketRequest({ ticket_text: 'x'.repeat(5001) })).toEqual({
      success: false,
      error: [{ path: 'ticket_text', message: 'ticket_text must be at most 5000 characters' }],
    });
  });

  it('measures length in characters, not UTF-16 units', () => {
    expect(validateTicketRequest({ ticket_text: '😀'.repeat(5) }).success).toBe(true);
    expect(validateTicketRequest({ ticket_text: '😀'.repeat(3000) }).success).toBe(true);
    expect(validateTicketRequest({ ticket_text: '😀😀😀' })).toEqual({
      success: false,
      error: [{ path: 'ticket_text', message: 'ticket_text must be at least 5 characters' }],
    });
    expect(validateTicketRequest({ ticket_text: '😀'.repeat(5001) })).toEqual({
      success: false,
      error: [{ path: 'ticket_text', message: 'ticket_text must be at most 5000 characters' }],
    });
  });

  it('rejects whitespace-only tickets', () => {
    expect(validateTicketRequest({ ticket_text: '        ' })).toEqual({
      success: false,
      error: [{ path: 'ticket_text', message: 'ticket_text must not be blank' }],
    });
  });

  it('rejects unknown keys', () => {
    const result = validateTicketRequest({ ticket_text: 'Please refund me', priority: 'high' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.map((i) => i.path)).toEqual(['root']);
    }
  });
});

describe('handleResolveTicket', () => {
  it('returns the external response on success', async () => {
    const result = await handleResolveTicket(
      { ticket_text: 'I want a refund for my new domain' },
      await refundDeps(),
    );

    expect(result).toEqual({
      status: 200,
      body: {
        answer: REFUND_ANSWER,
        references: [REFUND_REFERENCE],
        action_required: 'escalate_to_billing',
      },
    });
  });

  it('returns 400 with issues for an invalid body without running the pipeline', async () => {
    const llm = refundLlm();

    const result = await handleResolveTicket({ ticket_text: 'hi' }, await refundDeps(llm));

    expect(result).toEqual({
      status: 400,
      body: {
        error: 'bad_request',
        message: 'Invalid request body',
        issues: [{ path: 'ticket_text', message: 'ticket_text must be at least 5 characters' }],
      },
    });
    expect(llm.prompts).toEqual([]);
  });

  it('hides pipeline failures behind a generic 500', async () => {
    const result = await handleResolveTicket(
      { ticket_text: 'I want a refund for my new domain' },
      await refundDeps(refundLlm('not json')),
      'test-correlation-id',
    );

    expect(result).toEqual({
      status: 500,
      body: { error: 'internal_error', message: RESOLVE_FAILED_MESSAGE },
    });
  });
});
