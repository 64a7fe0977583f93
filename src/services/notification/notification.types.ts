/**
 * Notification Types and Templates
 */

import { NotificationJobData, NotificationType } from '../../queues/notification.queue';

/**
 * Notification templates
 */
export const NOTIFICATION_TEMPLATES: Record<NotificationType, { title: string; message: string }> =
  {
    [NotificationType.TOPUP_PAID]: {
      title: 'Payment received',
      message: '{credits} credits were added to your balance',
    },
    [NotificationType.TOPUP_FAILED]: {
      title: 'Payment not completed',
      message: 'Your payment of {rubAmount} RUB did not go through. No credits were charged',
    },
    [NotificationType.GENERATION_COMPLETED]: {
      title: 'Your image is ready',
      message: 'Generation {jobId} finished: {imageUrl}',
    },
    [NotificationType.GENERATION_FAILED]: {
      title: 'Generation failed',
      message: 'Sorry, generation {jobId} failed. {credits} credits were returned to your balance',
    },
  };

/**
 * Template data for notification messages
 */
export interface NotificationTemplateData {
  topupId?: string;
  jobId?: string;
  credits?: number;
  rubAmount?: number;
  imageUrl?: string;
}

/**
 * Delivery seam for notifications; the queue in production, a recorder in tests
 */
export interface NotificationPublisher {
  publish(data: NotificationJobData): Promise<void>;
}

/**
 * Render a notification template with data
 */
export function renderTemplate(
  type: NotificationType,
  data: NotificationTemplateData
): { title: string; message: string } {
  const template = NOTIFICATION_TEMPLATES[type];

  let title = template.title;
  let message = template.message;

  const replacements: Record<string, string> = {
    '{credits}': String(data.credits ?? 0),
    '{rubAmount}': String(data.rubAmount ?? 0),
    '{jobId}': data.jobId ?? '',
    '{topupId}': data.topupId ?? '',
    '{imageUrl}': data.imageUrl ?? '',
  };

  for (const [placeholder, value] of Object.entries(replacements)) {
    title = title.replace(placeholder, value);
    message = message.replace(placeholder, value);
  }

  return { title, message };
}
