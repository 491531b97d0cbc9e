// src/routes/index.ts: service metadata and liveness
import express from 'express';

export const SERVICE_NAME = 'support-ticket-resolver';
export const SERVICE_VERSION = '1.0.0';

export function createIndexRouter(): express.Router {
  const router = express.Router();

  router.get('/', (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      status: 'running',
      version: SERVICE_VERSION,
      health: '/health',
    });
  });

  router.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  return router;
}
