import { Router } from 'express';
import type { AppServices } from '../services';

export function healthRouter(services: AppServices): Router {
  const router = Router();

  router.get('/', async (_req, res) => {
    try {
      const categories = services.errorRepository.getAllCategories();
      const gpu = await services.gpuProvider.getSnapshot();

      res.json({
        status: 'ok',
        errorCatalog: {
          build: categories.build.length,
          checkstyle: categories.checkstyle.length,
        },
        gpu: gpu.available ? 'available' : 'unavailable',
        ts: new Date().toISOString(),
      });
    } catch (err) {
      res.status(503).json({
        status: 'error',
        error: err instanceof Error ? err.message : String(err),
      });
    }
  });

  return router;
}
