/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * The last stop of the middleware chain. Express 5 forwards rejected
 * promises from async handlers here, so controllers never wrap their own
 * try/catch.
 *
 *   - Operational (AppError): expected failures such as a malformed `limit`
 *     (400) or an unknown route (404). Logged at "warn"; the client gets
 *     the error's status and message.
 *   - Anything else (query failure, unreachable store, bugs): logged at
 *     "error" with the stack; the client gets an opaque 500.
 *
 * Express recognizes an error handler by its four parameters.
 */
import { logger } from '@core/logger';
import { AppError, NotFoundError } from '@shared/errors/AppError';
import type { ErrorResponse } from '@shared/contracts';
import type { NextFunction, Request, Response } from 'express';

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError && err.isOperational) {
    logger.warn({ statusCode: err.statusCode, message: err.message }, 'Operational error');
    const body: ErrorResponse = { status: 'error', message: err.message };
    res.status(err.statusCode).json(body);
    return;
  }

  logger.error({ err }, 'Unhandled error');
  const body: ErrorResponse = { status: 'error', message: 'Internal server error' };
  res.status(500).json(body);
}

/** Catch-all for unmatched routes; registered after every router. */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError('Route', `${req.method} ${req.path}`));
}
