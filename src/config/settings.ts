import type { MonitorConfig } from './schema';

export interface AnomalySettings {
  enabled: boolean;
  window: number;
  computeIntervalMinutes: number;
  cooldownMinutes: number;
  m: number;
  n: number;
  sensitivity: number;
  pctFactor: number;
}

/**
 * Immutable settings consumed by the monitoring core.
 *
 * Built once at startup and passed to constructors; core services never
 * read the global config object.
 */
export interface MonitoringSettings {
  readonly failureThreshold: number;
  readonly recoveryThreshold: number;
  readonly requestRetries: number;
  readonly requestBackoffSeconds: number;
  readonly initialDelaySeconds: number;
  readonly downtimeReminderMinutes: number;
  readonly reminderSweepMinutes: number;
  readonly retentionDays: number;
  readonly digestTime: string;
  readonly anomaly: Readonly<AnomalySettings>;
}

export function buildMonitoringSettings(config: MonitorConfig): MonitoringSettings {
  const { monitoring, anomaly } = config;

  return Object.freeze({
    failureThreshold: Math.max(1, monitoring.failureThreshold),
    recoveryThreshold: Math.max(1, monitoring.recoveryThreshold),
    requestRetries: Math.max(1, monitoring.requestRetries),
    requestBackoffSeconds: monitoring.requestBackoffSeconds,
    initialDelaySeconds: monitoring.initialDelaySeconds,
    downtimeReminderMinutes: monitoring.downtimeReminderMinutes,
    reminderSweepMinutes: Math.max(1, monitoring.reminderSweepMinutes),
    retentionDays: monitoring.retentionDays,
    digestTime: monitoring.digestTime,
    anomaly: Object.freeze({
      enabled: anomaly.enabled,
      window: Math.max(1, anomaly.window),
      computeIntervalMinutes: Math.max(1, anomaly.computeIntervalMinutes),
      cooldownMinutes: anomaly.cooldownMinutes,
      m: Math.max(1, anomaly.m),
      n: Math.max(anomaly.m, anomaly.n, 1),
      sensitivity: anomaly.sensitivity,
      pctFactor: anomaly.pctFactor,
    }),
  });
}
