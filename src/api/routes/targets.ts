import { Router } from 'express';
import { TargetsController } from '../controllers/TargetsController';
import { asyncHandler } from '../middleware/error-handler';
import { idParamsSchema, periodQuerySchema, validateRequest } from '../middleware/validation';
import type { MonitoringStore } from '../../lib/clients/database';
import type { BaselineProvider, TargetRegistry } from '../../services/detection';

/**
 * Create targets router
 */
export function createTargetsRouter(
  registry: TargetRegistry,
  store: MonitoringStore,
  baselines: BaselineProvider
): Router {
  const router = Router();
  const controller = new TargetsController(registry, store, baselines);
  const byId = validateRequest({ params: idParamsSchema });
  const byIdForPeriod = validateRequest({ params: idParamsSchema, query: periodQuerySchema });

  // GET /targets - List all targets
  router.get('/', asyncHandler(controller.list.bind(controller)));

  // POST /targets - Register a target
  router.post('/', asyncHandler(controller.create.bind(controller)));

  // GET /targets/:id - Get target
  router.get('/:id', byId, asyncHandler(controller.get.bind(controller)));

  // PATCH /targets/:id - Apply field updates
  router.patch('/:id', byId, asyncHandler(controller.update.bind(controller)));

  // DELETE /targets/:id - Remove target and its history
  router.delete('/:id', byId, asyncHandler(controller.remove.bind(controller)));

  router.post('/:id/pause', byId, asyncHandler(controller.pause.bind(controller)));
  router.post('/:id/resume', byId, asyncHandler(controller.resume.bind(controller)));
  router.post('/:id/mute', byId, asyncHandler(controller.mute.bind(controller)));
  router.post('/:id/unmute', byId, asyncHandler(controller.unmute.bind(controller)));

  // PUT /targets/:id/anomaly - Per-target anomaly tuning
  router.put('/:id/anomaly', byId, asyncHandler(controller.configureAnomaly.bind(controller)));

  // GET /targets/:id/stats?period=24h
  router.get('/:id/stats', byIdForPeriod, asyncHandler(controller.stats.bind(controller)));

  // GET /targets/:id/incidents?period=7d
  router.get('/:id/incidents', byIdForPeriod, asyncHandler(controller.incidents.bind(controller)));

  // GET /targets/:id/baseline - Latest latency baseline
  router.get('/:id/baseline', byId, asyncHandler(controller.baseline.bind(controller)));

  return router;
}

export default createTargetsRouter;
