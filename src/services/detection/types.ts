import type { AnomalyEvent, Baseline } from '../../lib/types/monitoring';
import type { MonitoredTarget } from '../../lib/types/target';

/**
 * Health fields the state machine reads and writes
 */
export type HealthState = Pick<
  MonitoredTarget,
  'isUp' | 'consecutiveFailures' | 'consecutiveSuccesses' | 'incidentStartTime'
>;

export interface TransitionContext {
  now: Date;
  checkIntervalSeconds: number;
  failureThreshold: number;
  recoveryThreshold: number;
}

export type TransitionEvent =
  | { type: 'none' }
  | { type: 'down'; incidentStart: Date; failureCount: number }
  | { type: 'recovered'; incidentStart: Date; incidentEnd: Date };

export interface Transition {
  next: HealthState;
  event: TransitionEvent;
}

/**
 * Why the anomaly detector did or did not raise an alert
 */
export type AnomalyDecision =
  | { outcome: 'disabled' }
  | { outcome: 'insufficient_data' }
  | { outcome: 'normal'; threshold: number }
  | { outcome: 'debounced'; threshold: number; exceeding: number; required: number }
  | { outcome: 'cooldown'; threshold: number; remainingMs: number }
  | { outcome: 'anomaly'; threshold: number; event: AnomalyEvent; notified: boolean };

export interface BaselineProvider {
  getLatestBaseline(targetId: number): Promise<Baseline | null>;
}

/**
 * Notified when a target's schedule must change
 */
export interface ScheduleListener {
  schedule(target: MonitoredTarget): void;
  unschedule(targetId: number): void;
}
