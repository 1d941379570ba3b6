import { Router } from 'express';
import { classifyGpu, memoryPercent, snapshotLevel } from '../../gpu/gpuStatus';
import { logger } from '../../utils/logger';
import type { AppServices } from '../services';

export function gpuRouter(services: AppServices): Router {
  const router = Router();
  const { thresholds } = services.settings;

  router.get('/', async (_req, res) => {
    try {
      const snapshot = await services.gpuProvider.getSnapshot();
      res.json({
        ...snapshot,
        level: snapshotLevel(snapshot, thresholds),
        gpus: snapshot.gpus.map((gpu) => ({
          ...gpu,
          memoryPercent: memoryPercent(gpu),
          level: classifyGpu(gpu, thresholds),
        })),
      });
    } catch (err) {
      logger.error('GPU status error', { error: err instanceof Error ? err.message : String(err) });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
