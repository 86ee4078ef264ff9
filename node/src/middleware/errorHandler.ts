import type { NextFunction, Request, Response } from 'express';
import { logger } from '../services/logger';
import { createErrorResponse } from '../utils/errorResponse';

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(createErrorResponse(`Route ${req.method} ${req.path} not found`, { code: 'NOT_FOUND' }));
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  logger.error('request:unhandled_error', {
    path: req.path,
    error: err instanceof Error ? err.message : String(err),
  });
  res.status(500).json(createErrorResponse('Internal Server Error', { code: 'INTERNAL_ERROR' }));
}
