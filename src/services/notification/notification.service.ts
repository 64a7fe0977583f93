/**
 * Notification Service
 *
 * Tells the bot front-end about payment and generation outcomes.
 * Called after the owning transaction commits; a failure to enqueue is
 * logged and never undoes the ledger change that triggered it.
 */

import { createServiceLogger } from '../../observability/logger';
import {
  enqueueNotification,
  NotificationJobData,
  NotificationType,
} from '../../queues/notification.queue';

import {
  NotificationPublisher,
  NotificationTemplateData,
  renderTemplate,
} from './notification.types';

const log = createServiceLogger('notification-service');

export const queueNotificationPublisher: NotificationPublisher = {
  async publish(data: NotificationJobData): Promise<void> {
    await enqueueNotification(data);
  },
};

export class NotificationService {
  constructor(private readonly publisher: NotificationPublisher = queueNotificationPublisher) {}

  /**
   * One notification per (type, reference); redelivered events collapse
   * onto the same queue job.
   */
  static notificationId(type: NotificationType, reference: string): string {
    return `ntf_${type.toLowerCase()}_${reference}`;
  }

  /**
   * Queue a notification for a user. Returns false if it could not be queued.
   */
  async queueNotification(
    userId: string,
    type: NotificationType,
    reference: string,
    data: NotificationTemplateData
  ): Promise<boolean> {
    const notificationId = NotificationService.notificationId(type, reference);
    const { title, message } = renderTemplate(type, data);

    try {
      await this.publisher.publish({ notificationId, userId, type, title, message, data });
      log.debug({ type, userId, notificationId }, 'Notification queued');
      return true;
    } catch (error) {
      log.error({ err: error, type, userId, notificationId }, 'Failed to queue notification');
      return false;
    }
  }

  async notifyTopupPaid(
    userId: string,
    topupId: string,
    credits: number,
    rubAmount: number
  ): Promise<boolean> {
    return this.queueNotification(userId, NotificationType.TOPUP_PAID, topupId, {
      topupId,
      credits,
      rubAmount,
    });
  }

  async notifyTopupFailed(userId: string, topupId: string, rubAmount: number): Promise<boolean> {
    return this.queueNotification(userId, NotificationType.TOPUP_FAILED, topupId, {
      topupId,
      rubAmount,
    });
  }

  async notifyGenerationCompleted(
    userId: string,
    jobId: string,
    imageUrl: string
  ): Promise<boolean> {
    return this.queueNotification(userId, NotificationType.GENERATION_COMPLETED, jobId, {
      jobId,
      imageUrl,
    });
  }

  async notifyGenerationFailed(userId: string, jobId: string, credits: number): Promise<boolean> {
    return this.queueNotification(userId, NotificationType.GENERATION_FAILED, jobId, {
      jobId,
      credits,
    });
  }
}
