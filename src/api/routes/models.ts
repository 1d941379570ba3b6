import { Router } from 'express';
import { logger } from '../../utils/logger';
import type { AppServices } from '../services';

export function modelsRouter(services: AppServices): Router {
  const router = Router();

  router.get('/', async (_req, res) => {
    try {
      const overview = await services.modelSource.getModelOverview();
      res.json({ ...overview, roles: services.settings.roles });
    } catch (err) {
      logger.error('Model overview error', { error: err instanceof Error ? err.message : String(err) });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
