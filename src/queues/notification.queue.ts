/**
 * Notification Queue
 *
 * Outbound user messages for the bot front-end. Enqueued after the store
 * transaction that produced them commits.
 */

import { Queue, Job } from 'bullmq';

import { logger } from '../observability/logger';

import { queueConnection, notificationJobOptions, QUEUE_NAMES } from './queue.config';

/**
 * Notification types
 */
export enum NotificationType {
  TOPUP_PAID = 'TOPUP_PAID',
  TOPUP_FAILED = 'TOPUP_FAILED',
  GENERATION_COMPLETED = 'GENERATION_COMPLETED',
  GENERATION_FAILED = 'GENERATION_FAILED',
}

/**
 * Notification job data structure
 */
export interface NotificationJobData {
  notificationId: string;
  userId: string;
  type: NotificationType;
  title: string;
  message: string;
  data?: {
    topupId?: string;
    jobId?: string;
    credits?: number;
    rubAmount?: number;
    imageUrl?: string;
  };
}

/**
 * Notification job result
 */
export interface NotificationJobResult {
  sent: boolean;
  statusCode?: number;
}

let notificationQueue: Queue<NotificationJobData, NotificationJobResult> | null = null;

/**
 * Get or create the notification queue
 */
export function getNotificationQueue(): Queue<NotificationJobData, NotificationJobResult> {
  if (!notificationQueue) {
    notificationQueue = new Queue<NotificationJobData, NotificationJobResult>(
      QUEUE_NAMES.NOTIFICATIONS,
      {
        connection: queueConnection,
        defaultJobOptions: notificationJobOptions,
      }
    );
    logger.info('Notification queue initialized');
  }
  return notificationQueue;
}

/**
 * Add a notification job to the queue
 */
export async function enqueueNotification(
  data: NotificationJobData
): Promise<Job<NotificationJobData, NotificationJobResult>> {
  const queue = getNotificationQueue();
  const job = await queue.add(`notification:${data.type}`, data, {
    jobId: data.notificationId, // Use notification ID for idempotency
  });
  logger.debug({ jobId: job.id, userId: data.userId }, 'Notification job added');
  return job;
}

/**
 * Close the notification queue connection
 */
export async function closeNotificationQueue(): Promise<void> {
  if (notificationQueue) {
    await notificationQueue.close();
    notificationQueue = null;
    logger.info('Notification queue closed');
  }
}
