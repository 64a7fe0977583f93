/**
 * Generation Worker
 *
 * Consumes generation jobs: marks the job processing, calls the image API
 * and reports the tagged outcome back to the coordinator. Only coordinator
 * operations are used; the worker never touches balances.
 */

import { Worker, Job } from 'bullmq';

import { runWithContext } from '../../observability/log-context';
import { createServiceLogger } from '../../observability/logger';
import { queueJobDuration, queueJobsTotal } from '../../observability/metrics';
import { traceGenerationJob } from '../../observability/tracing';
import { runGeneration } from '../../services/generation/generation.outcome';
import { JobCoordinator } from '../../services/generation/generation.service';
import { isTerminalState } from '../../services/generation/generation.state';
import { ImageGenerator } from '../../services/generation/image.generator';
import { GenerationJobMessage } from '../../types/domain';
import { GenerationJobResult } from '../generation.queue';
import { queueConnection, QUEUE_NAMES, WORKER_CONCURRENCY } from '../queue.config';

const log = createServiceLogger('generation-worker');

/** The parts of a BullMQ job the processor reads */
export type GenerationJob = Pick<
  Job<GenerationJobMessage, GenerationJobResult>,
  'id' | 'data' | 'attemptsMade'
>;

let generationWorker: Worker<GenerationJobMessage, GenerationJobResult> | null = null;

export interface GenerationWorkerDeps {
  coordinator: JobCoordinator;
  generator: ImageGenerator;
}

/**
 * Build the job processor. Redelivered jobs are safe: a terminal job is
 * skipped and settle is idempotent.
 */
export function createGenerationProcessor(
  deps: GenerationWorkerDeps
): (job: GenerationJob) => Promise<GenerationJobResult> {
  return async (job) => {
    const message = job.data;

    const context = { correlationId: message.jobId, jobId: message.jobId, userId: message.userId };

    return runWithContext(context, () =>
      traceGenerationJob(message.jobId, async (): Promise<GenerationJobResult> => {
        const stopTimer = queueJobDuration.startTimer({ queue: QUEUE_NAMES.GENERATIONS });
        try {
          const current = await deps.coordinator.getJob(message.jobId);
          if (isTerminalState(current.status)) {
            log.info({ status: current.status, attempt: job.attemptsMade + 1 }, 'Job already settled');
            queueJobsTotal.inc({ queue: QUEUE_NAMES.GENERATIONS, status: 'skipped' });
            return { status: 'skipped' };
          }

          await deps.coordinator.markProcessing(message.jobId);
          const outcome = await runGeneration(deps.generator, message);
          await deps.coordinator.settle(message.jobId, outcome);

          queueJobsTotal.inc({ queue: QUEUE_NAMES.GENERATIONS, status: outcome.kind });
          return { status: outcome.kind };
        } finally {
          stopTimer();
        }
      })
    );
  };
}

function setupWorkerEvents(worker: Worker<GenerationJobMessage, GenerationJobResult>): void {
  worker.on('completed', (job, result) => {
    log.debug({ jobId: job.id, status: result.status }, 'Generation job done');
  });

  worker.on('failed', (job, err) => {
    if (!job) {
      return;
    }
    const maxAttempts = job.opts.attempts ?? 1;
    queueJobsTotal.inc({ queue: QUEUE_NAMES.GENERATIONS, status: 'error' });
    log.error(
      { jobId: job.id, attempt: job.attemptsMade, maxAttempts, err },
      'Generation job errored'
    );
  });

  worker.on('error', (err) => {
    log.error({ err }, 'Generation worker error');
  });
}

export function startGenerationWorker(
  deps: GenerationWorkerDeps
): Worker<GenerationJobMessage, GenerationJobResult> {
  if (generationWorker) {
    return generationWorker;
  }

  generationWorker = new Worker<GenerationJobMessage, GenerationJobResult>(
    QUEUE_NAMES.GENERATIONS,
    createGenerationProcessor(deps),
    {
      connection: queueConnection,
      concurrency: WORKER_CONCURRENCY.GENERATIONS,
    }
  );

  setupWorkerEvents(generationWorker);
  log.info('Generation worker started');

  return generationWorker;
}

export async function stopGenerationWorker(): Promise<void> {
  if (generationWorker) {
    await generationWorker.close();
    generationWorker = null;
    log.info('Generation worker stopped');
  }
}
