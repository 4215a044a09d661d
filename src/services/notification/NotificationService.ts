import { errorMessage } from '../../lib/utils/errors';
import logger from '../../lib/utils/logger';
import { notificationsSent } from '../../lib/utils/metrics';
import type { MonitoringStore } from '../../lib/clients/database';
import type { NotificationKind } from '../../lib/types/subscription';
import { MessageFormatter } from './MessageFormatter';
import type {
  DeliveryResult,
  DispatchSummary,
  MessageSender,
  NotificationEvent,
  Notifier,
} from './types';

export interface NotificationServiceOptions {
  /** Always receives every notification */
  adminChatId: string;
}

/**
 * Resolves recipients for monitoring events and delivers them through the
 * messaging client. Delivery is best-effort: failures are returned and
 * logged, never thrown.
 */
export class NotificationService implements Notifier {
  private readonly formatter: MessageFormatter;

  constructor(
    private readonly store: Pick<MonitoringStore, 'listRecipients'>,
    private readonly sender: MessageSender,
    private readonly options: NotificationServiceOptions,
    formatter?: MessageFormatter
  ) {
    this.formatter = formatter ?? new MessageFormatter();
  }

  /**
   * Send one message to one recipient
   */
  async notify(recipientId: string, text: string): Promise<DeliveryResult> {
    try {
      const { messageId } = await this.sender.sendMessage(recipientId, text);
      return { status: 'delivered', recipientId, messageId };
    } catch (error) {
      return { status: 'failed', recipientId, reason: errorMessage(error) };
    }
  }

  async dispatch(event: NotificationEvent): Promise<DispatchSummary> {
    const targetId = event.kind === 'digest' ? null : event.target.id;
    const recipients = await this.resolveRecipients(targetId, event.kind);

    const summary: DispatchSummary = {
      kind: event.kind,
      recipients: recipients.length,
      delivered: 0,
      failed: 0,
      results: [],
    };

    if (recipients.length === 0) {
      logger.warn('No recipients for notification', { kind: event.kind, targetId });
      return summary;
    }

    const messages = this.formatter.formatMessages(event);

    for (const recipientId of recipients) {
      const result = await this.deliver(recipientId, messages);
      summary.results.push(result);

      if (result.status === 'delivered') {
        summary.delivered++;
        notificationsSent.inc({ kind: event.kind, result: 'delivered' });
      } else {
        summary.failed++;
        notificationsSent.inc({ kind: event.kind, result: 'failed' });
        logger.warn('Notification delivery failed', {
          kind: event.kind,
          targetId,
          recipientId,
          reason: result.reason,
        });
      }
    }

    logger.info('Notification dispatched', {
      kind: event.kind,
      targetId,
      delivered: summary.delivered,
      failed: summary.failed,
    });

    return summary;
  }

  /**
   * Send every part of a split message; the first failure decides the result
   */
  private async deliver(recipientId: string, messages: string[]): Promise<DeliveryResult> {
    let outcome: DeliveryResult | null = null;

    for (const text of messages) {
      const result = await this.notify(recipientId, text);
      if (outcome === null || outcome.status === 'delivered') {
        outcome = result;
      }
    }

    return outcome ?? { status: 'failed', recipientId, reason: 'Nothing to send' };
  }

  /**
   * Subscribed chats plus the fallback admin chat, without duplicates
   */
  async resolveRecipients(targetId: number | null, kind: NotificationKind): Promise<string[]> {
    const recipients = new Set<string>();

    if (this.options.adminChatId) {
      recipients.add(this.options.adminChatId);
    }

    try {
      for (const chatId of await this.store.listRecipients(targetId, kind)) {
        recipients.add(chatId);
      }
    } catch (error) {
      logger.error('Failed to load notification recipients', {
        kind,
        targetId,
        error: errorMessage(error),
      });
    }

    return [...recipients];
  }
}
