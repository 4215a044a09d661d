import { Router } from 'express';
import { SubscriptionsController } from '../controllers/SubscriptionsController';
import { asyncHandler } from '../middleware/error-handler';
import { chatQuerySchema, idParamsSchema, validateRequest } from '../middleware/validation';
import type { MonitoringStore } from '../../lib/clients/database';

/**
 * Create subscriptions router
 */
export function createSubscriptionsRouter(store: MonitoringStore): Router {
  const router = Router();
  const controller = new SubscriptionsController(store);

  // GET /subscriptions?chatId=... - List subscriptions
  router.get('/', validateRequest({ query: chatQuerySchema }), asyncHandler(controller.list.bind(controller)));

  // POST /subscriptions - Subscribe a chat globally or to one target
  router.post('/', asyncHandler(controller.create.bind(controller)));

  // DELETE /subscriptions/:id
  router.delete(
    '/:id',
    validateRequest({ params: idParamsSchema }),
    asyncHandler(controller.remove.bind(controller))
  );

  return router;
}

export default createSubscriptionsRouter;
