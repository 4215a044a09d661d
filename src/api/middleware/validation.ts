import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ValidationError } from '../../lib/utils/errors';
import logger from '../../lib/utils/logger';
import { formatZodIssues } from '../../lib/utils/validation';

/**
 * Request validation schema
 */
export interface ValidationSchema {
  body?: z.ZodTypeAny;
  query?: z.ZodTypeAny;
  params?: z.ZodTypeAny;
}

/**
 * Validation middleware factory
 *
 * Rejects requests whose body, query or URL params do not match the given
 * schemas. Handlers still read typed values through their own parsing.
 */
export function validateRequest(schema: ValidationSchema) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const parts: Array<[string, z.ZodTypeAny | undefined, unknown]> = [
      ['params', schema.params, req.params],
      ['query', schema.query, req.query],
      ['body', schema.body, req.body],
    ];

    for (const [part, partSchema, value] of parts) {
      if (!partSchema) {
        continue;
      }

      const result = partSchema.safeParse(value);
      if (!result.success) {
        logger.debug('Request validation failed', {
          path: req.path,
          method: req.method,
          part,
          errors: result.error.errors,
        });
        next(new ValidationError('Request validation failed', formatZodIssues(result.error)));
        return;
      }
    }

    next();
  };
}

// Common validation schemas
export const idParamsSchema = z.object({
  id: z
    .string()
    .regex(/^\d+$/, 'must be a positive integer')
    .transform((value) => parseInt(value, 10))
    .refine((value) => value > 0, 'must be a positive integer'),
});

export const periodQuerySchema = z.object({
  period: z
    .string()
    .regex(/^\d+[mhd]$/i, 'must look like 30m, 24h or 7d')
    .optional(),
});

export const chatQuerySchema = z.object({
  chatId: z.string().min(1).optional(),
});
