import { Router } from 'express';
import { THEME_NAMES, parseTheme } from '../../embed/styles/tokens';
import { themeVariables } from '../../embed/styles/theme';
import type { AppServices } from '../services';

/**
 * GET /api/v1/theme?theme=dark
 * Custom property values of one theme variant, for front ends that style themselves.
 */
export function themeRouter(services: AppServices): Router {
  const router = Router();

  router.get('/', (req, res) => {
    const theme = parseTheme(req.query.theme, services.settings.defaultTheme);
    res.json({ theme, themes: THEME_NAMES, variables: themeVariables(theme) });
  });

  return router;
}
