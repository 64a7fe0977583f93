/**
 * Notification Module
 */

export { NotificationService, queueNotificationPublisher } from './notification.service';
export {
  NOTIFICATION_TEMPLATES,
  NotificationPublisher,
  NotificationTemplateData,
  renderTemplate,
} from './notification.types';
