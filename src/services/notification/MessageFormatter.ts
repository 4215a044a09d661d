import type { MonitoredTarget } from '../../lib/types/target';
import type { NotificationEvent } from './types';

/** Telegram rejects longer message texts */
export const TELEGRAM_MESSAGE_LIMIT = 4096;

/**
 * Formats monitoring notifications as Telegram HTML
 */
export class MessageFormatter {
  constructor(private readonly maxMessageLength: number = TELEGRAM_MESSAGE_LIMIT) {}

  /**
   * The event as one or more messages within the length limit. Only the
   * digest is ever split, between targets.
   */
  formatMessages(event: NotificationEvent): string[] {
    if (event.kind !== 'digest') {
      return [this.format(event)];
    }

    const { header, parts } = this.digestParts(event);
    const messages: string[] = [];
    let current = header;

    for (const part of parts) {
      const candidate = `${current}\n\n${part}`;
      if (candidate.length > this.maxMessageLength) {
        messages.push(current);
        current = part;
      } else {
        current = candidate;
      }
    }

    messages.push(current);
    return messages;
  }

  format(event: NotificationEvent): string {
    switch (event.kind) {
      case 'down':
        return this.formatDown(event.target, event.incidentStart, event.failureCount, event.error);
      case 'recovered':
        return this.formatRecovered(
          event.target,
          event.incidentStart,
          event.incidentEnd,
          event.failureCount
        );
      case 'reminder':
        return this.formatReminder(event.target, event.incidentStart, event.now);
      case 'anomaly':
        return this.formatAnomaly(event);
      case 'digest':
        return this.formatDigest(event);
    }
  }

  formatDown(
    target: MonitoredTarget,
    incidentStart: Date,
    failureCount: number,
    error: string | null
  ): string {
    const lines = [
      `🔴 <b>DOWN: ${escapeHtml(target.name)}</b>`,
      '',
      ...this.targetLines(target),
      `<b>Failed checks:</b> ${failureCount}`,
      `<b>Incident start:</b> <code>${this.formatDate(incidentStart)}</code>`,
    ];

    if (error) {
      lines.push(`<b>Error:</b> <pre>${escapeHtml(error)}</pre>`);
    }

    return lines.join('\n');
  }

  formatRecovered(
    target: MonitoredTarget,
    incidentStart: Date,
    incidentEnd: Date,
    failureCount: number | null
  ): string {
    const lines = [
      `✅ <b>RECOVERED: ${escapeHtml(target.name)}</b>`,
      '',
      'The service is responding normally again.',
      '',
      '<b>Incident details:</b>',
      `  - Start: <code>${this.formatDate(incidentStart)}</code>`,
      `  - End: <code>${this.formatDate(incidentEnd)}</code>`,
      `  - Duration: <b>${formatDuration(incidentEnd.getTime() - incidentStart.getTime())}</b>`,
    ];

    if (failureCount !== null) {
      lines.push(`  - Failed checks: ${failureCount}`);
    }

    return lines.join('\n');
  }

  formatReminder(target: MonitoredTarget, incidentStart: Date, now: Date): string {
    return [
      `⏰ <b>STILL DOWN: ${escapeHtml(target.name)}</b>`,
      '',
      `<b>URL:</b> <code>${escapeHtml(target.url)}</code>`,
      `<b>Down for:</b> ${formatDuration(now.getTime() - incidentStart.getTime())}`,
      `<b>Since:</b> <code>${this.formatDate(incidentStart)}</code>`,
    ].join('\n');
  }

  private formatAnomaly(event: Extract<NotificationEvent, { kind: 'anomaly' }>): string {
    const { target, threshold, baselineMedian } = event;
    const anomaly = event.event;

    return [
      `⚠️ <b>LATENCY ANOMALY: ${escapeHtml(target.name)}</b>`,
      '',
      `<b>Response time:</b> ${anomaly.latencyMs} ms`,
      `<b>Threshold:</b> ${Math.round(threshold)} ms`,
      `<b>Baseline median:</b> ${Math.round(baselineMedian)} ms`,
      `<b>Deviation:</b> +${Math.round(anomaly.deviationScore)} ms (${anomaly.reason})`,
      `<b>Detected:</b> <code>${this.formatDate(anomaly.timestamp)}</code>`,
    ].join('\n');
  }

  private formatDigest(event: Extract<NotificationEvent, { kind: 'digest' }>): string {
    const { header, parts } = this.digestParts(event);
    return [header, ...parts].join('\n\n');
  }

  private digestParts(event: Extract<NotificationEvent, { kind: 'digest' }>): { header: string; parts: string[] } {
    const header = `☀️ <b>Daily report for ${event.generatedAt.toISOString().substring(0, 10)}</b>`;

    if (event.entries.length === 0) {
      return { header, parts: ['No active monitors.'] };
    }

    const parts = event.entries.map(({ target, stats }) => {
      const icon = target.isUp ? '🟢' : '🔴';
      return [
        `<b>${icon} ${escapeHtml(target.name)}</b> (ID: ${target.id})`,
        `  - Uptime: ${stats.uptimePercent.toFixed(2)}%`,
        `  - Incidents: ${stats.incidentCount}`,
        `  - Downtime: ${formatDuration(stats.totalDowntimeMs)}`,
        `  - Avg response: ${Math.round(stats.avgResponseTimeMs ?? 0)} ms`,
        `  - Anomalies: ${stats.anomalyCount}`,
      ].join('\n');
    });

    return { header, parts };
  }

  private targetLines(target: MonitoredTarget): string[] {
    return [
      `<b>ID:</b> <code>${target.id}</code>`,
      `<b>URL:</b> <code>${escapeHtml(target.url)}</code>`,
      `<b>Method:</b> ${target.method}`,
      `<b>Expected status:</b> ${target.expectedStatus}`,
    ];
  }

  /**
   * Format date for display
   */
  private formatDate(date: Date): string {
    return date.toISOString().replace('T', ' ').substring(0, 19) + ' UTC';
  }
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Human-readable duration such as "2h 15m 30s"
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const days = Math.floor(totalSeconds / 86400);
  const hours = Math.floor((totalSeconds % 86400) / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (seconds > 0 || parts.length === 0) parts.push(`${seconds}s`);

  return parts.join(' ');
}
