import { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';
import logger from '../../lib/utils/logger';

/**
 * Hash an API key for comparison
 */
export function hashApiKey(apiKey: string): string {
  return crypto.createHash('sha256').update(apiKey).digest('hex');
}

/**
 * API key authentication middleware
 *
 * Compares the X-API-Key header against the configured admin key. Both are
 * hashed first so the comparison runs in constant time.
 */
export function authenticateApiKey(configuredKey: string) {
  const expectedHash = configuredKey ? Buffer.from(hashApiKey(configuredKey), 'hex') : null;

  return (req: Request, res: Response, next: NextFunction): void => {
    const apiKey = req.headers['x-api-key'];

    if (!apiKey || typeof apiKey !== 'string') {
      logger.warn('Missing API key in request', {
        path: req.path,
        method: req.method,
        ip: req.ip,
      });
      res.status(401).json({
        error: {
          code: 'AUTHENTICATION_ERROR',
          message: 'Missing API key',
        },
      });
      return;
    }

    if (!expectedHash) {
      logger.error('Admin API key is not configured; rejecting request', { path: req.path });
      res.status(401).json({
        error: {
          code: 'AUTHENTICATION_ERROR',
          message: 'Admin API is disabled',
        },
      });
      return;
    }

    const providedHash = Buffer.from(hashApiKey(apiKey), 'hex');
    if (!crypto.timingSafeEqual(providedHash, expectedHash)) {
      logger.warn('Invalid API key', {
        path: req.path,
        method: req.method,
        ip: req.ip,
      });
      res.status(401).json({
        error: {
          code: 'AUTHENTICATION_ERROR',
          message: 'Invalid API key',
        },
      });
      return;
    }

    logger.debug('API key authenticated', { path: req.path, method: req.method });
    next();
  };
}
