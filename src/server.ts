import { initTracing, shutdownTracing } from './observability/tracing';

// Tracing must patch modules before express and mongoose load
initTracing();

import { createApp } from './app';
import { config } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { connectRedis, disconnectRedis } from './config/redis';
import { createContainer } from './container';
import { logger } from './observability/logger';
import { closeGenerationQueue } from './queues/generation.queue';
import { closeNotificationQueue } from './queues/notification.queue';

const container = createContainer();
const app = createApp(container);

const startServer = async (): Promise<void> => {
  try {
    await connectDatabase();
    logger.info('Database connected successfully');

    await connectRedis();
    logger.info('Redis connected successfully');

    const server = app.listen(config.port, () => {
      logger.info({ port: config.port, env: config.nodeEnv }, 'Server running');
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Starting graceful shutdown');

      server.close(async () => {
        logger.info('HTTP server closed');

        try {
          await closeGenerationQueue();
          await closeNotificationQueue();
          await disconnectRedis();
          await disconnectDatabase();
          await shutdownTracing();
          logger.info('Graceful shutdown completed');
          process.exit(0);
        } catch (error) {
          logger.error({ err: error }, 'Error during shutdown');
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
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
