import { config } from './config';
import { initTracing, shutdownTracing } from './observability/tracing';

initTracing(`${config.otel.serviceName}-worker`);

import { connectDatabase, disconnectDatabase } from './config/database';
import { createContainer } from './container';
import { logger } from './observability/logger';
import {
  closeGenerationQueue,
  closeMaintenanceQueue,
  closeNotificationQueue,
  scheduleReconciliationSweep,
  startGenerationWorker,
  startMaintenanceWorker,
  startNotificationWorker,
  stopGenerationWorker,
  stopMaintenanceWorker,
  stopNotificationWorker,
} from './queues';

const container = createContainer();

const startWorkers = async (): Promise<void> => {
  try {
    await connectDatabase();
    logger.info('Database connected successfully');

    startGenerationWorker({ coordinator: container.coordinator, generator: container.generator });
    startNotificationWorker();
    startMaintenanceWorker(container.reconciliation);
    await scheduleReconciliationSweep(config.sweep.intervalMs, config.sweep.batchSize);
    logger.info({ sweepIntervalMs: config.sweep.intervalMs }, 'Workers started');

    const shutdown = async (signal: string): Promise<void> => {
      logger.info({ signal }, 'Stopping workers');

      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 30000).unref();

      try {
        // Let in-flight jobs finish before closing connections
        await stopGenerationWorker();
        await stopNotificationWorker();
        await stopMaintenanceWorker();
        await closeGenerationQueue();
        await closeNotificationQueue();
        await closeMaintenanceQueue();
        await disconnectDatabase();
        await shutdownTracing();
        logger.info('Graceful shutdown completed');
        process.exit(0);
      } catch (error) {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start workers');
    process.exit(1);
  }
};

void startWorkers();
