import type {
  MonitoredTarget,
  TargetConfigPatch,
  TargetCreateInput,
  TargetStatusUpdate,
} from '../../types/target';
import type {
  AnomalyEvent,
  AnomalyEventInput,
  Baseline,
  CheckResult,
  Incident,
  PeriodStats,
  RetentionResult,
} from '../../types/monitoring';
import type { NotificationKind, Subscription, SubscriptionInput } from '../../types/subscription';

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  username: string;
  password: string;
  encrypt: boolean;
}

/**
 * Persistence operations the monitoring core relies on.
 *
 * Each method is a single logical write or read; the store provides per-row
 * atomicity and the core adds no locking of its own.
 */
export interface MonitoringStore {
  // Targets
  createTarget(input: TargetCreateInput): Promise<MonitoredTarget>;
  getTarget(id: number): Promise<MonitoredTarget | null>;
  listTargets(): Promise<MonitoredTarget[]>;
  listActiveTargets(): Promise<MonitoredTarget[]>;
  updateTargetConfig(id: number, patch: TargetConfigPatch): Promise<MonitoredTarget | null>;
  updateTargetStatus(id: number, update: TargetStatusUpdate): Promise<void>;
  /** Deletes the target; history, incidents, baselines and anomalies cascade */
  deleteTarget(id: number): Promise<boolean>;

  // Check history
  appendCheckResult(result: CheckResult): Promise<void>;
  /** Latest successful latencies, oldest first */
  getRecentSuccessfulLatencies(targetId: number, limit: number): Promise<number[]>;
  countFailedChecksSince(targetId: number, since: Date): Promise<number>;

  // Incidents
  /** Opens an incident unless one is already open; returns the open incident */
  openIncident(targetId: number, startTime: Date): Promise<Incident>;
  /**
   * Closes the open incident with the given start time (or any open incident
   * of the target when startTime is null). No-op when nothing is open.
   */
  closeIncident(targetId: number, startTime: Date | null, endTime: Date): Promise<Incident | null>;
  getOpenIncident(targetId: number): Promise<Incident | null>;
  listIncidents(targetId: number, since: Date): Promise<Incident[]>;

  // Baselines
  appendBaseline(baseline: Baseline): Promise<void>;
  getLatestBaseline(targetId: number): Promise<Baseline | null>;

  // Anomalies
  appendAnomalyEvent(event: AnomalyEventInput): Promise<AnomalyEvent>;
  getLastAnomalyTime(targetId: number): Promise<Date | null>;

  // Reminders
  getLastReminderTime(targetId: number): Promise<Date | null>;
  setLastReminderTime(targetId: number, at: Date): Promise<void>;

  // Subscribers
  /**
   * Chat ids to notify: unmuted subscribers of the target plus global
   * subscribers; anomaly notifications also honour the subscriber preference.
   * The fallback recipient is added by the caller.
   */
  listRecipients(targetId: number | null, kind: NotificationKind): Promise<string[]>;
  listSubscriptions(chatId?: string): Promise<Subscription[]>;
  createSubscription(input: SubscriptionInput): Promise<Subscription>;
  deleteSubscription(id: number): Promise<boolean>;

  // Reporting and retention
  getStatsForPeriod(targetId: number, since: Date, now: Date): Promise<PeriodStats>;
  purgeBefore(cutoff: Date): Promise<RetentionResult>;

  ping(): Promise<void>;
}
