import { Request, Response, NextFunction } from 'express';
import logger from '../../lib/utils/logger';
import { apiRequestDuration } from '../../lib/utils/metrics';

/**
 * Request logging and metrics middleware
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = process.hrtime.bigint();

  logger.debug('Incoming request', {
    method: req.method,
    path: req.originalUrl,
    ip: req.ip,
  });

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - startTime) / 1e6;
    const routePath: unknown = req.route?.path;
    const route = typeof routePath === 'string' ? `${req.baseUrl}${routePath}` : 'unmatched';

    apiRequestDuration.observe(
      { method: req.method, route, status: res.statusCode.toString() },
      durationMs / 1000
    );

    const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
    logger.log(level, 'Request completed', {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Math.round(durationMs),
    });
  });

  next();
}
