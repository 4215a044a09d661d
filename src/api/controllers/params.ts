import { Request } from 'express';
import { ValidationError } from '../../lib/utils/errors';
import { parsePeriod } from '../../lib/utils/period';
import { validate } from '../../lib/utils/validation';
import { idParamsSchema, periodQuerySchema } from '../middleware/validation';

export function idParam(req: Request): number {
  return validate(idParamsSchema, req.params, 'path parameters').id;
}

/**
 * Start of the requested period (`?period=24h`), counted back from `now`
 */
export function periodStart(req: Request, fallback: string, now: Date): { period: string; since: Date } {
  const { period = fallback } = validate(periodQuerySchema, req.query, 'query');
  const ms = parsePeriod(period);
  if (ms === null) {
    throw new ValidationError(`Invalid period: ${period}`);
  }
  return { period, since: new Date(now.getTime() - ms) };
}
