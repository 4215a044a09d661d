import { Router } from 'express';
import { createTargetsRouter } from './targets';
import { createSubscriptionsRouter } from './subscriptions';
import type { MonitoringStore } from '../../lib/clients/database';
import type { BaselineProvider, TargetRegistry } from '../../services/detection';

/**
 * Dependencies for API routes
 */
export interface ApiDependencies {
  store: MonitoringStore;
  registry: TargetRegistry;
  baselines: BaselineProvider;
}

/**
 * Create all admin API routes
 */
export function createApiRouter(deps: ApiDependencies): Router {
  const router = Router();

  router.use('/targets', createTargetsRouter(deps.registry, deps.store, deps.baselines));
  router.use('/subscriptions', createSubscriptionsRouter(deps.store));

  return router;
}

export { createTargetsRouter } from './targets';
export { createSubscriptionsRouter } from './subscriptions';
export { createHealthRouter } from './health';
