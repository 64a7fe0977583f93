/**
 * Notification Worker
 *
 * Delivers notifications to the bot front-end over HTTP with an HMAC
 * signature. A failed delivery is thrown back to BullMQ, which retries
 * with exponential backoff.
 */

import { Worker, Job } from 'bullmq';
import axios from 'axios';
import crypto from 'crypto';

import { config } from '../../config';
import { createServiceLogger } from '../../observability/logger';
import { queueJobsTotal } from '../../observability/metrics';
import { NotificationJobData, NotificationJobResult } from '../notification.queue';
import { queueConnection, QUEUE_NAMES, WORKER_CONCURRENCY } from '../queue.config';

const log = createServiceLogger('notification-worker');

export type NotificationJob = Pick<
  Job<NotificationJobData, NotificationJobResult>,
  'id' | 'data' | 'attemptsMade'
>;

let notificationWorker: Worker<NotificationJobData, NotificationJobResult> | null = null;

export interface NotificationDeliveryOptions {
  url: string;
  secret: string;
  timeoutMs: number;
}

/**
 * Sign payload with HMAC-SHA256
 */
export function signPayload(payload: object, secret: string): string {
  const data = JSON.stringify(payload);
  return crypto.createHmac('sha256', secret).update(data).digest('hex');
}

export function createNotificationProcessor(
  options: NotificationDeliveryOptions = config.notify
): (job: NotificationJob) => Promise<NotificationJobResult> {
  return async (job) => {
    const payload = job.data;
    const signature = signPayload(payload, options.secret);

    try {
      const response = await axios.post(options.url, payload, {
        headers: {
          'Content-Type': 'application/json',
          'X-Signature': `sha256=${signature}`,
          'X-Notification-ID': payload.notificationId,
        },
        timeout: options.timeoutMs,
        validateStatus: (status) => status >= 200 && status < 300,
      });

      queueJobsTotal.inc({ queue: QUEUE_NAMES.NOTIFICATIONS, status: 'completed' });
      return { sent: true, statusCode: response.status };
    } catch (error) {
      const statusCode = axios.isAxiosError(error) ? error.response?.status : undefined;
      log.warn(
        {
          notificationId: payload.notificationId,
          statusCode,
          attempt: job.attemptsMade + 1,
          err: error,
        },
        'Notification delivery failed'
      );
      throw error; // Re-throw to trigger BullMQ retry
    }
  };
}

function setupWorkerEvents(worker: Worker<NotificationJobData, NotificationJobResult>): void {
  worker.on('completed', (job, result) => {
    log.debug({ jobId: job.id, statusCode: result.statusCode }, 'Notification delivered');
  });

  worker.on('failed', (job, err) => {
    if (!job) {
      return;
    }
    const maxAttempts = job.opts.attempts ?? 1;
    if (job.attemptsMade >= maxAttempts) {
      queueJobsTotal.inc({ queue: QUEUE_NAMES.NOTIFICATIONS, status: 'failed' });
      log.error(
        { jobId: job.id, userId: job.data.userId, attempts: job.attemptsMade, err },
        'Notification dropped after final attempt'
      );
    }
  });

  worker.on('error', (err) => {
    log.error({ err }, 'Notification worker error');
  });
}

/**
 * Start the notification worker
 */
export function startNotificationWorker(
  options: NotificationDeliveryOptions = config.notify
): Worker<NotificationJobData, NotificationJobResult> {
  if (notificationWorker) {
    return notificationWorker;
  }

  notificationWorker = new Worker<NotificationJobData, NotificationJobResult>(
    QUEUE_NAMES.NOTIFICATIONS,
    createNotificationProcessor(options),
    {
      connection: queueConnection,
      concurrency: WORKER_CONCURRENCY.NOTIFICATIONS,
    }
  );

  setupWorkerEvents(notificationWorker);
  log.info('Notification worker started');

  return notificationWorker;
}

/**
 * Stop the notification worker
 */
export async function stopNotificationWorker(): Promise<void> {
  if (notificationWorker) {
    await notificationWorker.close();
    notificationWorker = null;
    log.info('Notification worker stopped');
  }
}

export function isNotificationWorkerRunning(): boolean {
  return notificationWorker !== null && !notificationWorker.closing;
}
