/**
 * Queue Module Exports
 */

// Configuration
export {
  queueConnection,
  generationJobOptions,
  notificationJobOptions,
  maintenanceJobOptions,
  QUEUE_NAMES,
  WORKER_CONCURRENCY,
} from './queue.config';

// Generation Queue
export {
  GenerationQueue,
  GenerationJobResult,
  BullGenerationQueue,
  getGenerationQueue,
  enqueueGeneration,
  closeGenerationQueue,
  getGenerationQueueStats,
} from './generation.queue';

// Notification Queue
export {
  NotificationType,
  NotificationJobData,
  NotificationJobResult,
  getNotificationQueue,
  enqueueNotification,
  closeNotificationQueue,
} from './notification.queue';

// Maintenance Queue
export {
  SWEEP_JOB_NAME,
  SweepJobData,
  SweepJobResult,
  getMaintenanceQueue,
  scheduleReconciliationSweep,
  closeMaintenanceQueue,
} from './maintenance.queue';

// Workers
export {
  startGenerationWorker,
  stopGenerationWorker,
  createGenerationProcessor,
} from './workers/generation.worker';

export {
  startNotificationWorker,
  stopNotificationWorker,
  isNotificationWorkerRunning,
  createNotificationProcessor,
} from './workers/notification.worker';

export {
  startMaintenanceWorker,
  stopMaintenanceWorker,
  createSweepProcessor,
} from './workers/maintenance.worker';
