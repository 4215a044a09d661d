import type { HttpMethod } from './common';

/**
 * A monitored HTTP endpoint together with its current health state
 */
export interface MonitoredTarget {
  id: number;
  name: string;
  url: string;
  method: HttpMethod;
  expectedStatus: number;
  timeoutSeconds: number;
  checkIntervalSeconds: number;
  /** Comma-separated top-level keys the JSON response must contain */
  jsonKeys: string | null;
  headers: Record<string, string> | null;
  requestBody: unknown;

  isActive: boolean;
  isUp: boolean;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  incidentStartTime: Date | null;

  lastChecked: Date | null;
  lastStatusCode: number | null;
  lastResponseTimeMs: number | null;
  lastError: string | null;

  // Anomaly tuning; null falls back to the global default
  anomalySensitivity: number | null;
  anomalyM: number | null;
  anomalyN: number | null;
  anomalyAlertsEnabled: boolean;

  muted: boolean;
  mutedUntil: Date | null;

  createdAt: Date;
}

export interface TargetCreateInput {
  name: string;
  url: string;
  method: HttpMethod;
  expectedStatus: number;
  timeoutSeconds: number;
  checkIntervalSeconds: number;
  jsonKeys: string | null;
  headers: Record<string, string> | null;
  requestBody: unknown;
  isActive: boolean;
  anomalySensitivity: number | null;
  anomalyM: number | null;
  anomalyN: number | null;
  anomalyAlertsEnabled: boolean;
}

/**
 * Health fields written after every check, in one update
 */
export interface TargetStatusUpdate {
  isUp: boolean;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  incidentStartTime: Date | null;
  lastChecked: Date;
  lastStatusCode: number | null;
  lastResponseTimeMs: number;
  lastError: string | null;
}

/**
 * Fields an administrator may change, one tagged entry per field
 */
export type TargetFieldUpdate =
  | { field: 'name'; value: string }
  | { field: 'url'; value: string }
  | { field: 'method'; value: HttpMethod }
  | { field: 'expectedStatus'; value: number }
  | { field: 'timeoutSeconds'; value: number }
  | { field: 'checkIntervalSeconds'; value: number }
  | { field: 'jsonKeys'; value: string | null }
  | { field: 'headers'; value: Record<string, string> | null }
  | { field: 'requestBody'; value?: unknown };

export type TargetField = TargetFieldUpdate['field'];

/**
 * Configuration patch applied by the store; only set keys are written
 */
export type TargetConfigPatch = Partial<
  Pick<
    MonitoredTarget,
    | 'name'
    | 'url'
    | 'method'
    | 'expectedStatus'
    | 'timeoutSeconds'
    | 'checkIntervalSeconds'
    | 'jsonKeys'
    | 'headers'
    | 'requestBody'
    | 'isActive'
    | 'muted'
    | 'mutedUntil'
    | 'anomalySensitivity'
    | 'anomalyM'
    | 'anomalyN'
    | 'anomalyAlertsEnabled'
  >
>;

/**
 * True while the target's notifications are silenced
 */
export function isTargetMuted(target: Pick<MonitoredTarget, 'muted' | 'mutedUntil'>, now: Date): boolean {
  if (!target.muted) {
    return false;
  }
  return target.mutedUntil === null || target.mutedUntil.getTime() > now.getTime();
}
