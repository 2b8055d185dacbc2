import { initTracing, shutdownTracing, logger } from './observability';

// Tracing must start before the instrumented modules load
initTracing();

import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { connectBackingServices } from './bootstrap';
import { disconnectRedis } from './config/redis';
import { eventBus } from './events/eventBus';

const app = createApp();

const startServer = async (): Promise<void> => {
  try {
    await connectBackingServices();

    const server = app.listen(config.port, () => {
      logger.info({ port: config.port, ...getEnvironmentInfo() }, 'Server running');
    });

    const shutdown = (signal: string): void => {
      logger.info(`${signal} received. Starting graceful shutdown...`);

      server.close(async () => {
        logger.info('HTTP server closed');

        try {
          await eventBus.disconnect();
          await disconnectRedis();
          await shutdownTracing();
          logger.info('Graceful shutdown completed');
          process.exit(0);
        } catch (error) {
          logger.error({ error }, 'Error during shutdown');
          process.exit(1);
        }
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
