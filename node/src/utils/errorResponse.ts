/**
 * Error body shared by every endpoint. Internal diagnostics (stack, collaborator
 * payloads, retrieval traces) never go in here.
 */
import type { ValidationIssue } from './errors';

export type ErrorCode = 'bad_request' | 'not_found' | 'rate_limited' | 'internal_error';

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  issues?: ValidationIssue[];
}

export function createErrorResponse(
  error: ErrorCode,
  message: string,
  issues?: ValidationIssue[],
): ErrorResponse {
  return {
    error,
    message,
    ...(issues && issues.length > 0 && { issues }),
  };
}
