import { describe, it, expect } from 'vitest';
import {
  MAX_REWRITTEN_QUERIES,
  parseRewrittenQueries,
  rewriteTicket,
} from '@/services/query-rewrite';
import { InputError } from '@/utils/errors';
import { ScriptedLlm } from './helpers/fakes';

describe('parseRewrittenQueries', () => {
  it('strips list decoration, blank lines and exact duplicates', () => {
    const raw = '1. domain suspension WHOIS\n- domain suspension WHOIS\n\n  * refund policy  \n2) billing dispute';

    expect(parseRewrittenQueries(raw)).toEqual([
      'domain suspension WHOIS',
      'refund policy',
      'billing dispute',
    ]);
  });

  it('keeps at most five queries in model order', () => {
    const raw = ['q1', 'q2', 'q3', 'q4', 'q5', 'q6', 'q7'].join('\n');

    const queries = parseRewrittenQueries(raw);

    expect(queries).toEqual(['q1', 'q2', 'q3', 'q4', 'q5']);
    expect(queries).toHaveLength(MAX_REWRITTEN_QUERIES);
  });

  it('splits CRLF output', () => {
    expect(parseRewrittenQueries('dns propagation\r\nssl renewal\r\n')).toEqual([
      'dns propagation',
      'ssl renewal',
    ]);
  });

  it('treats case variants as distinct queries', () => {
    expect(parseRewrittenQueries('WHOIS privacy\nwhois privacy')).toEqual([
      'WHOIS privacy',
      'whois privacy',
    ]);
  });

  it('returns an empty list for whitespace-only output', () => {
    expect(parseRewrittenQueries('\n   \n\t')).toEqual([]);
  });
});

describe('rewriteTicket', () => {
  it('sends the trimmed ticket in the prompt and parses the reply', async () => {
    const llm = new ScriptedLlm(() => 'domain suspension after email change\nregistrant email verification');

    const queries = await rewriteTicket('  My domain was suspended.  ', llm);

    expect(queries).toEqual([
      'domain suspension after email change',
      'registrant email verification',
    ]);
    expect(llm.prompts).toHaveLength(1);
    expect(llm.prompts[0]).toContain('"""My domain was suspended."""');
  });

  it('rejects a blank ticket without calling the model', async () => {
    const llm = new ScriptedLlm(() => 'unused');

    await expect(rewriteTicket('   ', llm)).rejects.toBeInstanceOf(InputError);
    expect(llm.prompts).toHaveLength(0);
  });
});
