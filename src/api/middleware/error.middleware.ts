import { Request, Response, NextFunction } from 'express';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { ApiError, ErrorKind, RaceConditionError } from '../../utils/errors.js';

/**
 * REST API Error Response Format
 */
export interface ErrorResponse {
  error: {
    kind: ErrorKind;
    message: string;
    field?: string;
    // ids created before a bulk import stopped
    committedIds?: readonly string[];
  };
}

/**
 * Generic Error Handling Middleware
 *
 * This middleware ONLY knows about ApiError.
 * All library-specific errors should be converted to ApiError at their source.
 */
export function errorMiddleware(
  error: unknown,
  req: Request,
  res: Response<ErrorResponse>,
  _next: NextFunction
): void {
  // user facing errors
  if (error instanceof ApiError) {
    const level = error.statusCode >= 500 || error instanceof RaceConditionError ? 'error' : 'warn';
    logger[level](
      { kind: error.kind, field: error.field, method: req.method, path: req.path },
      error.message
    );
    res.status(error.statusCode).json({
      error: {
        kind: error.kind,
        message: error.message,
        field: error.field,
        committedIds: error instanceof RaceConditionError ? error.committedIds : undefined,
      },
    });
    return;
  }

  logger.error(
    {
      err: error,
      method: req.method,
      path: req.path,
      query: req.query,
    },
    'Request error'
  );

  // For any other error, return 500
  // In production, hide error details
  const message =
    config.nodeEnv === 'production'
      ? 'Internal server error'
      : error instanceof Error
        ? error.message
        : 'Unknown error';

  res.status(500).json({
    error: {
      kind: 'Internal',
      message,
    },
  });
}
