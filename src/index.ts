import { config } from './config/env';
import { startServer } from './api/server';
import { JsonErrorRepository } from './errors/jsonErrorRepository';
import { NvidiaSmiProvider } from './gpu/nvidiaSmi';
import { OllamaClient } from './models/ollamaClient';
import { logger } from './utils/logger';
import type { AppServices } from './api/services';

async function main() {
  logger.info('Peer review dashboard starting...');

  const errorRepository = new JsonErrorRepository(config.errors);
  const categories = errorRepository.getAllCategories();
  if (categories.build.length === 0 && categories.checkstyle.length === 0) {
    logger.warn('Error catalog is empty; check BUILD_ERRORS_PATH and CHECKSTYLE_ERRORS_PATH');
  }

  const services: AppServices = {
    errorRepository,
    gpuProvider: new NvidiaSmiProvider({ binary: config.gpu.nvidiaSmiPath, timeoutMs: config.gpu.timeoutMs }),
    modelSource: new OllamaClient({ baseUrl: config.ollama.baseUrl, timeoutMs: config.ollama.timeoutMs }),
    settings: {
      apiKey: config.api.apiKey,
      defaultTheme: config.theme.default,
      thresholds: config.gpu.thresholds,
      roles: config.ollama.roles,
    },
  };

  const server = await startServer(services, config.api.port);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close((err) => {
      if (err) {
        logger.error('Error closing server', { error: err.message });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err) => {
  logger.error('Fatal startup error', { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
