import * as http from 'http';
import express from 'express';
import { logger } from '../utils/logger';
import { apiKeyAuth } from './middleware/auth';
import type { AppServices } from './services';

import { healthRouter } from './routes/health';
import { themeRouter } from './routes/theme';
import { gpuRouter } from './routes/gpu';
import { modelsRouter } from './routes/models';
import { errorsRouter } from './routes/errors';
import { dashboardRouter } from '../embed/routes/dashboard';
import { errorsPageRouter } from '../embed/routes/errors';
import { reviewRouter } from '../embed/routes/review';
import { stylesheetRouter } from '../embed/routes/stylesheet';

export function createServer(services: AppServices) {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false, limit: '1mb' }));
  app.set('trust proxy', 1);

  app.use((req, res, next) => {
    if (req.method === 'OPTIONS') {
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'x-api-key, content-type');
      res.sendStatus(204);
      return;
    }
    next();
  });

  // HTML pages
  app.use('/theme.css', stylesheetRouter());
  app.use('/errors', errorsPageRouter(services));
  app.use('/review', reviewRouter(services));

  // JSON API
  const requireKey = apiKeyAuth(services.settings.apiKey);
  app.use('/api/v1/health', healthRouter(services));
  app.use('/api/v1/theme', requireKey, themeRouter(services));
  app.use('/api/v1/gpu', requireKey, gpuRouter(services));
  app.use('/api/v1/models', requireKey, modelsRouter(services));
  app.use('/api/v1/errors', requireKey, errorsRouter(services));

  // Mounted last so only the exact root path renders the dashboard
  app.use('/', dashboardRouter(services));

  // 404
  app.use((_req, res) => res.status(404).json({ error: 'Not found' }));

  return app;
}

export function startServer(services: AppServices, port: number): Promise<http.Server> {
  const app = createServer(services);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info(`Peer review dashboard running on port ${port}`, {
        env: process.env.NODE_ENV,
        port,
      });
      logger.info('Endpoints:', {
        dashboard: `http://localhost:${port}/`,
        errors: `http://localhost:${port}/errors`,
        health: `http://localhost:${port}/api/v1/health`,
      });
      resolve(server);
    });
    server.on('error', reject);
  });
}
