import { Router } from 'express';
import { THEME_CSS } from '../styles/theme';

/** GET /theme.css */
export function stylesheetRouter(): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.setHeader('Content-Type', 'text/css; charset=utf-8');
    res.setHeader('Cache-Control', 'public, max-age=300');
    res.send(THEME_CSS);
  });

  return router;
}
