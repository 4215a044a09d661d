import { Router } from 'express';
import { HealthController, HealthDependencies } from '../controllers/HealthController';
import { asyncHandler } from '../middleware/error-handler';

/**
 * Create health router
 */
export function createHealthRouter(deps: HealthDependencies): Router {
  const router = Router();
  const controller = new HealthController(deps);

  // GET /health - Basic liveness check
  router.get('/', asyncHandler(controller.liveness.bind(controller)));

  // GET /health/live - Liveness probe
  router.get('/live', asyncHandler(controller.liveness.bind(controller)));

  // GET /health/ready - Readiness probe
  router.get('/ready', asyncHandler(controller.readiness.bind(controller)));

  return router;
}

export default createHealthRouter;
