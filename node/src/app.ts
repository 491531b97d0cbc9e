// src/app.ts: express app wiring (listening happens in index.ts)
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';

import type { AppConfig } from '@/config/app.config';
import type { OrchestratorDeps } from '@/services/orchestrator';
import { attachCorrelationId } from '@/middleware/correlation';
import { ticketRateLimiter } from '@/middleware/rate-limit-query';
import { errorHandler } from '@/middleware/errorHandler';
import { notFoundHandler } from '@/middleware/notFoundHandler';
import { createIndexRouter } from '@/routes/index';
import { createTicketRouter } from '@/routes/tickets';
import { logger } from '@/services/logger';

export const JSON_BODY_LIMIT = '64kb';

export function createApp(
  deps: OrchestratorDeps,
  config: Pick<AppConfig, 'nodeEnv' | 'corsOrigins'>,
): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.corsOrigins, credentials: true }));
  app.use(attachCorrelationId);
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  const format = config.nodeEnv === 'development' ? 'dev' : 'combined';
  app.use(
    morgan(format, {
      stream: { write: (line: string) => logger.info('http:access', line.trim()) },
    }),
  );

  const rateLimited = config.nodeEnv !== 'development';
  logger.info('http:rate_limiting', { enabled: rateLimited });

  app.use(createIndexRouter());
  app.use(
    '/api',
    createTicketRouter(deps, rateLimited ? { rateLimiter: ticketRateLimiter } : {}),
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
