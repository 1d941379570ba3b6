import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../../utils/logger';

/**
 * `x-api-key` check for the /api/v1 routes. An empty key disables the check.
 */
export function apiKeyAuth(apiKey: string): RequestHandler {
  let warnedOnce = false;

  return (req: Request, res: Response, next: NextFunction) => {
    // Open when no key is configured
    if (!apiKey) {
      if (!warnedOnce) {
        logger.warn('API_KEY is not set; /api/v1 routes are unauthenticated');
        warnedOnce = true;
      }
      next();
      return;
    }

    const key = req.headers['x-api-key'];
    if (typeof key !== 'string' || key !== apiKey) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }

    next();
  };
}
