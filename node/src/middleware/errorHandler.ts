import type { Request, Response, NextFunction } from 'express';
import { logger } from '@/services/logger';
import { errorMessage } from '@/utils/errors';
import { createErrorResponse } from '@/utils/errorResponse';
import { getCorrelationId } from './correlation';

/** Body-parser failures carry an HTTP status; everything else is an internal error. */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const status = err.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const status = clientErrorStatus(err);
  if (status !== undefined) {
    logger.warn('http:client_error', { status, correlationId: getCorrelationId(res) });
    res.status(status).json(createErrorResponse('bad_request', 'Malformed request body'));
    return;
  }

  logger.error('http:unhandled_error', {
    correlationId: getCorrelationId(res),
    error: errorMessage(err),
  });
  res.status(500).json(createErrorResponse('internal_error', 'Internal Server Error'));
}
