/**
 * Check results, incidents, baselines and anomaly records
 */

export type CheckFailure =
  | { kind: 'timeout'; message: string }
  | { kind: 'transport'; message: string }
  | { kind: 'status_mismatch'; expected: number; actual: number }
  | { kind: 'missing_keys'; keys: string[] }
  | { kind: 'invalid_json'; message: string };

export type CheckFailureKind = CheckFailure['kind'];

export interface CheckResult {
  targetId: number;
  timestamp: Date;
  success: boolean;
  /** Wall time of the final attempt; -1 when nothing could be measured */
  latencyMs: number;
  statusCode: number | null;
  error: string | null;
  failure: CheckFailure | null;
  attempts: number;
}

export interface Incident {
  id: number;
  targetId: number;
  startTime: Date;
  endTime: Date | null;
}

export interface BaselineStats {
  windowSize: number;
  median: number;
  mad: number;
  ewma: number;
  ucl: number;
  p95: number;
}

export interface Baseline extends BaselineStats {
  targetId: number;
  computedAt: Date;
}

export type AnomalyReason = 'ucl_exceeded' | 'p95_exceeded';

export interface AnomalyEvent {
  id: number;
  targetId: number;
  timestamp: Date;
  latencyMs: number;
  deviationScore: number;
  reason: AnomalyReason;
}

export type AnomalyEventInput = Omit<AnomalyEvent, 'id'>;

export interface NotificationState {
  targetId: number;
  lastReminderAt: Date | null;
}

export interface PeriodStats {
  since: Date;
  totalChecks: number;
  okChecks: number;
  uptimePercent: number;
  avgResponseTimeMs: number | null;
  incidentCount: number;
  totalDowntimeMs: number;
  avgDowntimeMs: number;
  anomalyCount: number;
}

export interface RetentionResult {
  checksDeleted: number;
  anomaliesDeleted: number;
  baselinesDeleted: number;
}
