/**
 * Generation Queue
 *
 * Durable hand-off of reserved generation jobs to the worker pool.
 * Delivery is at-least-once.
 */

import { Queue } from 'bullmq';

import { logger } from '../observability/logger';
import { GenerationJobMessage } from '../types/domain';

import { generationJobOptions, queueConnection, QUEUE_NAMES } from './queue.config';

export type GenerationJobResult = { status: 'completed' | 'failed' | 'skipped' };

/**
 * What the job coordinator needs from a queue
 */
export interface GenerationQueue {
  enqueue(message: GenerationJobMessage): Promise<void>;
  /** Jobs not yet finished: waiting, active and delayed */
  depth(): Promise<number>;
}

let generationQueue: Queue<GenerationJobMessage, GenerationJobResult> | null = null;

/**
 * Get or create the generation queue
 */
export function getGenerationQueue(): Queue<GenerationJobMessage, GenerationJobResult> {
  if (!generationQueue) {
    generationQueue = new Queue<GenerationJobMessage, GenerationJobResult>(
      QUEUE_NAMES.GENERATIONS,
      {
        connection: queueConnection,
        defaultJobOptions: generationJobOptions,
      }
    );
    logger.info('Generation queue initialized');
  }
  return generationQueue;
}

/**
 * Add a generation job. The job id is the generation's job id, so a second
 * enqueue of the same job is collapsed by BullMQ.
 */
export async function enqueueGeneration(message: GenerationJobMessage): Promise<void> {
  const queue = getGenerationQueue();
  const job = await queue.add('generation', message, { jobId: message.jobId });
  logger.debug({ jobId: job.id, userId: message.userId }, 'Generation job added');
}

export async function closeGenerationQueue(): Promise<void> {
  if (generationQueue) {
    await generationQueue.close();
    generationQueue = null;
    logger.info('Generation queue closed');
  }
}

export async function getGenerationQueueStats(): Promise<{
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}> {
  const queue = getGenerationQueue();
  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);
  return { waiting, active, completed, failed, delayed };
}

/**
 * GenerationQueue over the shared BullMQ queue
 */
export class BullGenerationQueue implements GenerationQueue {
  async enqueue(message: GenerationJobMessage): Promise<void> {
    await enqueueGeneration(message);
  }

  async depth(): Promise<number> {
    const { waiting, active, delayed } = await getGenerationQueueStats();
    return waiting + active + delayed;
  }
}
