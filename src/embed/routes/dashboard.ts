import { Router, Request, Response } from 'express';
import { parseTheme } from '../styles/tokens';
import { renderDashboardPage } from '../templates/dashboardPage';
import { logger } from '../../utils/logger';
import type { AppServices } from '../../api/services';

/**
 * GET /?theme=light|dark
 * Full dashboard page: GPU status, models and the error catalog summary.
 */
export function dashboardRouter(services: AppServices): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response) => {
    const theme = parseTheme(req.query.theme, services.settings.defaultTheme);

    try {
      const [gpu, models] = await Promise.all([
        services.gpuProvider.getSnapshot(),
        services.modelSource.getModelOverview(),
      ]);

      const html = renderDashboardPage({
        theme,
        gpu,
        thresholds: services.settings.thresholds,
        models,
        roles: services.settings.roles,
        categories: services.errorRepository.getAllCategories(),
        generatedAt: new Date(),
      });

      res.setHeader('Content-Type', 'text/html; charset=utf-8');
      res.setHeader('Cache-Control', 'no-store');
      res.send(html);
    } catch (err) {
      logger.error('Dashboard render error', { error: err instanceof Error ? err.message : String(err) });
      res.status(500).send('Internal error rendering dashboard');
    }
  });

  return router;
}
