import { Request, Response, NextFunction } from 'express';
import { PlatformError } from '../../lib/utils/errors';
import logger from '../../lib/utils/logger';

/**
 * Global error handler middleware
 *
 * Catches all errors and formats them into consistent API responses.
 */
export function errorHandler(error: Error, req: Request, res: Response, _next: NextFunction): void {
  // Handle known platform errors
  if (error instanceof PlatformError) {
    const log = error.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log('Request error', {
      path: req.path,
      method: req.method,
      code: error.code,
      error: error.message,
    });

    res.status(error.statusCode).json({
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
      },
    });
    return;
  }

  // Malformed JSON body
  if (error instanceof SyntaxError) {
    logger.warn('Malformed request body', { path: req.path, method: req.method });
    res.status(400).json({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Malformed JSON body',
      },
    });
    return;
  }

  logger.error('Request error', {
    path: req.path,
    method: req.method,
    error: error.message,
    stack: error.stack,
  });

  // Handle unknown errors
  res.status(500).json({
    error: {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    },
  });
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  logger.debug('Route not found', {
    path: req.path,
    method: req.method,
  });

  res.status(404).json({
    error: {
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
    },
  });
}

/**
 * Async handler wrapper
 *
 * Wraps async route handlers to properly catch and forward errors
 * to the error handler middleware.
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
