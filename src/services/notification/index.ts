export { NotificationService } from './NotificationService';
export type { NotificationServiceOptions } from './NotificationService';
export { MessageFormatter, TELEGRAM_MESSAGE_LIMIT, escapeHtml, formatDuration } from './MessageFormatter';
export type {
  DeliveryResult,
  DigestEntry,
  DispatchSummary,
  MessageSender,
  NotificationEvent,
  Notifier,
} from './types';
