import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { DIFFICULTIES, categorySelectionSchema, catalogErrorSchema } from '../../errors/schema';
import { mapProblemAreasToCategories } from '../../errors/problemAreas';
import { queryString } from '../../utils/query';
import { logger } from '../../utils/logger';
import type { AppServices } from '../services';

const selectRequestSchema = z.object({
  categories: categorySelectionSchema.optional(),
  problemAreas: z.array(z.string()).optional(),
  specificErrors: z.array(catalogErrorSchema).optional(),
  count: z.number().int().min(1).max(20).default(4),
  difficulty: z.enum(DIFFICULTIES).default('medium'),
});

export function errorsRouter(services: AppServices): Router {
  const router = Router();
  const repo = services.errorRepository;

  /**
   * GET /api/v1/errors/categories
   */
  router.get('/categories', (_req: Request, res: Response) => {
    res.json(repo.getAllCategories());
  });

  /**
   * GET /api/v1/errors/search?q=term
   */
  router.get('/search', (req: Request, res: Response) => {
    const q = queryString(req.query.q)?.trim();
    if (!q) {
      res.status(400).json({ error: 'q is required' });
      return;
    }
    res.json({ query: q, results: repo.searchErrors(q) });
  });

  /**
   * POST /api/v1/errors/select
   * Picks the errors for a generated exercise. Problem areas, when given,
   * take the place of explicit categories.
   */
  router.post('/select', (req: Request, res: Response) => {
    const parsed = selectRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request body', issues: parsed.error.flatten().fieldErrors });
      return;
    }

    const { categories, problemAreas, specificErrors, count, difficulty } = parsed.data;
    const selectedCategories = problemAreas && problemAreas.length > 0
      ? mapProblemAreasToCategories(problemAreas)
      : categories;

    try {
      const result = repo.getErrorsForLlm({ selectedCategories, specificErrors, count, difficulty });
      res.json({ difficulty, ...result });
    } catch (err) {
      logger.error('Error selection failed', { error: err instanceof Error ? err.message : String(err) });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
