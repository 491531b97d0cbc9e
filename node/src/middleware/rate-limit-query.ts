// node/src/middleware/rate-limit-query.ts: resolve-ticket rate limiter
import rateLimit from 'express-rate-limit';
import { createErrorResponse } from '@/utils/errorResponse';

export const ticketRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  limit: 60, // 60 tickets per IP per minute
  standardHeaders: true,
  legacyHeaders: false,
  message: createErrorResponse('rate_limited', 'Too many requests'),
});
