import type { Request, Response } from 'express';
import { createErrorResponse } from '@/utils/errorResponse';

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(createErrorResponse('not_found', `Route ${req.method} ${req.path} not found`));
}
