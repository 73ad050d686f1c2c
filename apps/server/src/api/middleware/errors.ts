import type { NextFunction, Request, Response } from 'express';
import { createLogger } from '@social-publisher/shared';
import { AppError } from '../../errors';

const logger = createLogger('http');

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ message: 'Route not found' });
}

// Known errors keep their status; anything else is logged and reported as 500
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof AppError) {
    res.status(error.httpStatus).json({ message: error.message });
    return;
  }

  if (error instanceof SyntaxError) {
    res.status(400).json({ message: 'Malformed JSON body' });
    return;
  }

  logger.error(`${req.method} ${req.originalUrl} failed`, error);
  res.status(500).json({ message: 'Internal server error' });
}
