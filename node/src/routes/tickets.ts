// src/routes/tickets.ts: POST /api/resolve-ticket
import express, { type Request, type Response, type RequestHandler } from 'express';
import { resolveTicket, toExternalResponse, type OrchestratorDeps } from '@/services/orchestrator';
import { validateTicketRequest } from '@/validation/ticket-request';
import { createErrorResponse, type ErrorResponse } from '@/utils/errorResponse';
import { errorMessage, PipelineError } from '@/utils/errors';
import { getCorrelationId } from '@/middleware/correlation';
import { logger } from '@/services/logger';
import type { TicketResponse } from '@/types/core';

export const RESOLVE_FAILED_MESSAGE = 'Failed to resolve support ticket';

export interface TicketRouteResult {
  status: number;
  body: TicketResponse | ErrorResponse;
}

/** Transport-independent body of the resolve endpoint. */
export async function handleResolveTicket(
  body: unknown,
  deps: OrchestratorDeps,
  correlationId?: string,
): Promise<TicketRouteResult> {
  const parsed = validateTicketRequest(body);
  if (!parsed.success) {
    logger.warn('ticket:bad_request', { correlationId, issues: parsed.error });
    return {
      status: 400,
      body: createErrorResponse('bad_request', 'Invalid request body', parsed.error),
    };
  }

  try {
    const result = await resolveTicket(parsed.data.ticket_text, deps);
    return { status: 200, body: toExternalResponse(result) };
  } catch (err: unknown) {
    logger.error('ticket:failed', {
      correlationId,
      code: err instanceof PipelineError ? err.code : 'unexpected',
      error: errorMessage(err),
    });
    return { status: 500, body: createErrorResponse('internal_error', RESOLVE_FAILED_MESSAGE) };
  }
}

export function createTicketRouter(
  deps: OrchestratorDeps,
  options: { rateLimiter?: RequestHandler } = {},
): express.Router {
  const router = express.Router();
  const guards: RequestHandler[] = options.rateLimiter ? [options.rateLimiter] : [];

  router.post('/resolve-ticket', ...guards, async (req: Request, res: Response) => {
    const { status, body } = await handleResolveTicket(req.body, deps, getCorrelationId(res));
    res.status(status).json(body);
  });

  return router;
}
