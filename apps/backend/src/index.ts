// =============================================================================
// Chat Recall Backend - HTTP Entry Point
// =============================================================================

// Load environment variables from .env file
import 'dotenv/config';

import { serve } from '@hono/node-server';
import { createApp } from './api/http/router.js';
import { createServices } from './services/index.js';
import { loadConfig } from './infrastructure/config/index.js';
import { logger } from './infrastructure/logging/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  const services = await createServices(config);
  const app = createApp({
    chatHistory: services.chatHistory,
    index: services.index,
    exposeErrors: config.env === 'development',
  });

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info('Server started', {
      port: info.port,
      environment: config.env,
      store: config.store.backend,
    });
  });

  // ===========================================================================
  // Graceful Shutdown
  // ===========================================================================

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close(() => {
      services
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Failed to close services', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start server', error);
  process.exit(1);
});
