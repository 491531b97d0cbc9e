import type { Server } from 'node:http';
import axios, { type AxiosInstance } from 'axios';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { createApp } from '@/app';
import { CORRELATION_HEADER } from '@/middleware/correlation';
import { RESOLVE_FAILED_MESSAGE } from '@/routes/tickets';
import { SERVICE_NAME, SERVICE_VERSION } from '@/routes/index';
import type { OrchestratorDeps } from '@/services/orchestrator';
import { refundDeps, refundLlm, REFUND_ANSWER, REFUND_REFERENCE } from './helpers/refund-pipeline';

interface RunningApp {
  client: AxiosInstance;
  close: () => Promise<void>;
}

/** Serves the app on an ephemeral loopback port for the duration of a test. */
async function serve(deps: OrchestratorDeps): Promise<RunningApp> {
  const app = createApp(deps, { nodeEnv: 'test', corsOrigins: [] });
  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }

  return {
    client: axios.create({
      baseURL: `http://127.0.0.1:${address.port}`,
      validateStatus: () => true,
    }),
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

describe('HTTP app', () => {
  let running: RunningApp;

  beforeAll(async () => {
    running = await serve(await refundDeps());
  });

  afterAll(async () => {
    await running.close();
  });

  it('resolves a ticket and returns only the response contract', async () => {
    const res = await running.client.post('/api/resolve-ticket', {
      ticket_text: 'I want a refund for my new domain',
    });

    expect(res.status).toBe(200);
    expect(res.data).toEqual({
      answer: REFUND_ANSWER,
      references: [REFUND_REFERENCE],
      action_required: 'escalate_to_billing',
    });
    expect(Object.keys(res.data)).toEqual(['answer', 'references', 'action_required']);
  });

  it('maps a schema violation to 400 bad_request with issues', async () => {
    const res = await running.client.post('/api/resolve-ticket', { ticket_text: 'hi' });

    expect(res.status).toBe(400);
    expect(res.data).toEqual({
      error: 'bad_request',
      message: 'Invalid request body',
      issues: [{ path: 'ticket_text', message: 'ticket_text must be at least 5 characters' }],
    });
  });

  it('maps malformed JSON to 400 bad_request', async () => {
    const res = await running.client.post('/api/resolve-ticket', '{"ticket_text":', {
      headers: { 'Content-Type': 'application/json' },
      transformRequest: [(data: string) => data],
    });

    expect(res.status).toBe(400);
    expect(res.data).toEqual({ error: 'bad_request', message: 'Malformed request body' });
  });

  it('answers unknown routes with 404 not_found', async () => {
    const res = await running.client.get('/api/unknown');

    expect(res.status).toBe(404);
    expect(res.data).toEqual({ error: 'not_found', message: 'Route GET /api/unknown not found' });
  });

  it('echoes a supplied correlation id', async () => {
    const res = await running.client.get('/health', {
      headers: { [CORRELATION_HEADER]: 'test-correlation-id' },
    });

    expect(res.status).toBe(200);
    expect(res.data).toEqual({ status: 'ok' });
    expect(res.headers[CORRELATION_HEADER]).toBe('test-correlation-id');
  });

  it('generates a correlation id when none is supplied', async () => {
    const res = await running.client.get('/health');

    expect(res.headers[CORRELATION_HEADER]).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });

  it('describes the service at the root', async () => {
    const res = await running.client.get('/');

    expect(res.data).toEqual({
      service: SERVICE_NAME,
      status: 'running',
      version: SERVICE_VERSION,
      health: '/health',
    });
  });
});

describe('HTTP app with a failing pipeline', () => {
  it('returns the generic 500 body', async () => {
    const running = await serve(await refundDeps(refundLlm('not json')));
    try {
      const res = await running.client.post('/api/resolve-ticket', {
        ticket_text: 'I want a refund for my new domain',
      });

      expect(res.status).toBe(500);
      expect(res.data).toEqual({ error: 'internal_error', message: RESOLVE_FAILED_MESSAGE });
    } finally {
      await running.close();
    }
  });
});
