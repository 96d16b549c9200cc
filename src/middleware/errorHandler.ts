import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Centralized error handler
 * Ensures all errors are returned as valid JSON
 * Format: { ok: false, error: { code: string, message: string, details?: unknown } }
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  // Ensure response hasn't been sent
  if (res.headersSent) {
    return next(err);
  }

  const requestId = res.locals.requestId;
  const development = process.env.NODE_ENV === 'development';

  if (err instanceof ZodError) {
    res.status(400).json({
      ok: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request data',
        details: err.errors,
      },
    });
    return;
  }

  // express.json() parse failures
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({
      ok: false,
      error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' },
    });
    return;
  }

  if (err instanceof AppError && err.isOperational) {
    logger.warn('Request failed', { requestId, code: err.code, path: req.path, message: err.message });
    res.status(err.statusCode).json({
      ok: false,
      error: {
        code: err.code,
        message: err.message,
        ...(err.details !== undefined && { details: err.details }),
      },
    });
    return;
  }

  logger.error('Unhandled error', err, { requestId, method: req.method, path: req.path });

  const stack = err instanceof Error ? err.stack : undefined;
  res.status(500).json({
    ok: false,
    error: {
      code: 'INTERNAL_SERVER_ERROR',
      message: 'Internal Server Error',
      requestId,
      ...(development && stack && { stack }),
    },
  });
}

/**
 * 404 Not Found handler
 * Returns valid JSON response
 */
export function notFoundHandler(req: Request, res: Response): void {
  logger.warn('Route not found', { requestId: res.locals.requestId, path: req.path });
  res.status(404).json({
    ok: false,
    error: {
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
    },
  });
}
