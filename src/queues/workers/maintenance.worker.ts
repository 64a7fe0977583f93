/**
 * Maintenance Worker
 *
 * Runs the scheduled reconciliation sweep.
 */

import { Worker, Job } from 'bullmq';

import { runWithContext } from '../../observability/log-context';
import { createServiceLogger } from '../../observability/logger';
import { queueJobDuration, queueJobsTotal } from '../../observability/metrics';
import { ReconciliationService } from '../../services/reconciliation/reconciliation.service';
import { SweepJobData, SweepJobResult } from '../maintenance.queue';
import { queueConnection, QUEUE_NAMES, WORKER_CONCURRENCY } from '../queue.config';

const log = createServiceLogger('maintenance-worker');

export type SweepJob = Pick<Job<SweepJobData, SweepJobResult>, 'id' | 'data'>;

let maintenanceWorker: Worker<SweepJobData, SweepJobResult> | null = null;

export function createSweepProcessor(
  reconciliation: ReconciliationService
): (job: SweepJob) => Promise<SweepJobResult> {
  return async (job) => {
    const stopTimer = queueJobDuration.startTimer({ queue: QUEUE_NAMES.MAINTENANCE });
    try {
      const result = await runWithContext({ correlationId: `sweep_${job.id ?? 'manual'}` }, () =>
        reconciliation.sweep(new Date(), job.data.batchSize)
      );
      queueJobsTotal.inc({ queue: QUEUE_NAMES.MAINTENANCE, status: 'completed' });
      return result;
    } finally {
      stopTimer();
    }
  };
}

export function startMaintenanceWorker(
  reconciliation: ReconciliationService
): Worker<SweepJobData, SweepJobResult> {
  if (maintenanceWorker) {
    return maintenanceWorker;
  }

  maintenanceWorker = new Worker<SweepJobData, SweepJobResult>(
    QUEUE_NAMES.MAINTENANCE,
    createSweepProcessor(reconciliation),
    {
      connection: queueConnection,
      concurrency: WORKER_CONCURRENCY.MAINTENANCE,
    }
  );

  maintenanceWorker.on('failed', (job, err) => {
    queueJobsTotal.inc({ queue: QUEUE_NAMES.MAINTENANCE, status: 'failed' });
    log.error({ jobId: job?.id, err }, 'Reconciliation sweep failed');
  });

  maintenanceWorker.on('error', (err) => {
    log.error({ err }, 'Maintenance worker error');
  });

  log.info('Maintenance worker started');
  return maintenanceWorker;
}

export async function stopMaintenanceWorker(): Promise<void> {
  if (maintenanceWorker) {
    await maintenanceWorker.close();
    maintenanceWorker = null;
    log.info('Maintenance worker stopped');
  }
}
