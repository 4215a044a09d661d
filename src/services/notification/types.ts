import type { AnomalyEvent, PeriodStats } from '../../lib/types/monitoring';
import type { MonitoredTarget } from '../../lib/types/target';
import type { NotificationKind } from '../../lib/types/subscription';

/**
 * Outcome of one delivery attempt to one recipient
 */
export type DeliveryResult =
  | { status: 'delivered'; recipientId: string; messageId?: number }
  | { status: 'failed'; recipientId: string; reason: string };

export interface DigestEntry {
  target: Pick<MonitoredTarget, 'id' | 'name' | 'isUp'>;
  stats: PeriodStats;
}

export type NotificationEvent =
  | {
      kind: 'down';
      target: MonitoredTarget;
      incidentStart: Date;
      failureCount: number;
      error: string | null;
    }
  | {
      kind: 'recovered';
      target: MonitoredTarget;
      incidentStart: Date;
      incidentEnd: Date;
      /** Failed checks recorded during the incident; null when unknown */
      failureCount: number | null;
    }
  | {
      kind: 'reminder';
      target: MonitoredTarget;
      incidentStart: Date;
      now: Date;
    }
  | {
      kind: 'anomaly';
      target: MonitoredTarget;
      event: AnomalyEvent;
      threshold: number;
      baselineMedian: number;
    }
  | {
      kind: 'digest';
      generatedAt: Date;
      entries: DigestEntry[];
    };

export interface DispatchSummary {
  kind: NotificationKind;
  recipients: number;
  delivered: number;
  failed: number;
  results: DeliveryResult[];
}

/**
 * Sends notification events; never rejects
 */
export interface Notifier {
  dispatch(event: NotificationEvent): Promise<DispatchSummary>;
}

/**
 * Transport used to reach a single chat
 */
export interface MessageSender {
  sendMessage(chatId: string, text: string): Promise<{ messageId: number }>;
}
