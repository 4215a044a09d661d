import { Request, Response } from 'express';
import { z } from 'zod';
import type { MonitoringStore } from '../../lib/clients/database';
import { NotFoundError } from '../../lib/utils/errors';
import logger from '../../lib/utils/logger';
import { validate } from '../../lib/utils/validation';
import { chatQuerySchema } from '../middleware/validation';
import { idParam } from './params';

const subscriptionBodySchema = z.object({
  chatId: z.union([z.string().trim().min(1), z.number().int()]).transform(String),
  targetId: z.number().int().positive().nullable().default(null),
  muted: z.boolean().default(false),
  anomalyNotifications: z.boolean().default(true),
});

/**
 * Notification subscriptions API controller
 */
export class SubscriptionsController {
  constructor(
    private readonly store: Pick<
      MonitoringStore,
      'getTarget' | 'listSubscriptions' | 'createSubscription' | 'deleteSubscription'
    >
  ) {}

  async list(req: Request, res: Response): Promise<void> {
    const { chatId } = validate(chatQuerySchema, req.query, 'query');
    const subscriptions = await this.store.listSubscriptions(chatId);
    res.json({ data: subscriptions });
  }

  async create(req: Request, res: Response): Promise<void> {
    const input = validate(subscriptionBodySchema, req.body, 'subscription');

    if (input.targetId !== null && !(await this.store.getTarget(input.targetId))) {
      throw new NotFoundError('Target', input.targetId);
    }

    const subscription = await this.store.createSubscription(input);
    logger.info('Subscription created', {
      id: subscription.id,
      chatId: subscription.chatId,
      targetId: subscription.targetId,
    });

    res.status(201).json(subscription);
  }

  async remove(req: Request, res: Response): Promise<void> {
    const id = idParam(req);
    if (!(await this.store.deleteSubscription(id))) {
      throw new NotFoundError('Subscription', id);
    }
    res.status(204).end();
  }
}
