import { Router } from 'express';
import type { HealthController } from '../controllers/health.controller';

export const createHealthRoutes = (controller: HealthController): Router => {
  const router: Router = Router();

  router.get('/', controller.home);
  router.get('/health', controller.healthCheck);

  return router;
};

export default createHealthRoutes;
