/**
 * Maintenance Queue
 *
 * Carries the repeatable reconciliation sweep. One scheduled job per
 * deployment regardless of how many worker processes run.
 */

import { Queue } from 'bullmq';

import { logger } from '../observability/logger';

import { maintenanceJobOptions, queueConnection, QUEUE_NAMES } from './queue.config';

export const SWEEP_JOB_NAME = 'reconciliation-sweep';

export interface SweepJobData {
  batchSize: number;
}

export interface SweepJobResult {
  generationsFailed: number;
  topupsExpired: number;
  errors: number;
}

let maintenanceQueue: Queue<SweepJobData, SweepJobResult> | null = null;

export function getMaintenanceQueue(): Queue<SweepJobData, SweepJobResult> {
  if (!maintenanceQueue) {
    maintenanceQueue = new Queue<SweepJobData, SweepJobResult>(QUEUE_NAMES.MAINTENANCE, {
      connection: queueConnection,
      defaultJobOptions: maintenanceJobOptions,
    });
    logger.info('Maintenance queue initialized');
  }
  return maintenanceQueue;
}

/**
 * Register the repeatable sweep. Re-registering with the same interval is a
 * no-op in BullMQ.
 */
export async function scheduleReconciliationSweep(
  intervalMs: number,
  batchSize: number
): Promise<void> {
  const queue = getMaintenanceQueue();
  await queue.add(
    SWEEP_JOB_NAME,
    { batchSize },
    {
      repeat: { every: intervalMs },
      jobId: SWEEP_JOB_NAME,
    }
  );
  logger.info({ intervalMs, batchSize }, 'Reconciliation sweep scheduled');
}

export async function closeMaintenanceQueue(): Promise<void> {
  if (maintenanceQueue) {
    await maintenanceQueue.close();
    maintenanceQueue = null;
    logger.info('Maintenance queue closed');
  }
}
