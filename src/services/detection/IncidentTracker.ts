import type { MonitoringStore } from '../../lib/clients/database';
import type { MonitoringSettings } from '../../config/settings';
import { errorMessage } from '../../lib/utils/errors';
import { createChildLogger, type Logger } from '../../lib/utils/logger';
import { incidentsStarted } from '../../lib/utils/metrics';
import type { CheckResult } from '../../lib/types/monitoring';
import type { MonitoredTarget } from '../../lib/types/target';
import type { NotificationEvent, Notifier } from '../notification/types';
import { applyCheckOutcome } from './stateMachine';
import type { HealthState, Transition } from './types';

export type IncidentTrackerSettings = Pick<MonitoringSettings, 'failureThreshold' | 'recoveryThreshold'>;

export interface TrackerOutcome extends Transition {
  previous: HealthState;
}

/**
 * Feeds check results through the UP/DOWN state machine and keeps the
 * incident log and target status in step with it.
 *
 * Persistence and notification failures are logged and do not stop the
 * remaining steps.
 */
export class IncidentTracker {
  constructor(
    private readonly store: MonitoringStore,
    private readonly notifier: Notifier,
    private readonly settings: IncidentTrackerSettings
  ) {}

  async process(target: MonitoredTarget, result: CheckResult): Promise<TrackerOutcome> {
    const log = createChildLogger(`target:${target.id}`);
    const now = result.timestamp;

    await this.attempt(log, 'Failed to append check result', () =>
      this.store.appendCheckResult(result)
    );

    const previous: HealthState = {
      isUp: target.isUp,
      consecutiveFailures: target.consecutiveFailures,
      consecutiveSuccesses: target.consecutiveSuccesses,
      incidentStartTime: target.incidentStartTime,
    };

    const transition = applyCheckOutcome(previous, result.success, {
      now,
      checkIntervalSeconds: target.checkIntervalSeconds,
      failureThreshold: this.settings.failureThreshold,
      recoveryThreshold: this.settings.recoveryThreshold,
    });
    const { next, event } = transition;

    let notification: NotificationEvent | null = null;

    if (event.type === 'down') {
      log.error('Target is DOWN', {
        name: target.name,
        failures: event.failureCount,
        incidentStart: event.incidentStart.toISOString(),
      });

      await this.attempt(log, 'Failed to open incident', () =>
        this.store.openIncident(target.id, event.incidentStart)
      );
      incidentsStarted.inc({ target_id: String(target.id) });

      notification = {
        kind: 'down',
        target,
        incidentStart: event.incidentStart,
        failureCount: event.failureCount,
        error: result.error,
      };
    } else if (event.type === 'recovered') {
      log.info('Target RECOVERED', {
        name: target.name,
        downtimeMs: event.incidentEnd.getTime() - event.incidentStart.getTime(),
      });

      await this.attempt(log, 'Failed to close incident', () =>
        this.store.closeIncident(target.id, previous.incidentStartTime, event.incidentEnd)
      );

      const countFrom = failureCountStart(event.incidentStart, target.checkIntervalSeconds);
      const failureCount = await this.attempt(log, 'Failed to count failed checks', () =>
        this.store.countFailedChecksSince(target.id, countFrom)
      );

      notification = {
        kind: 'recovered',
        target,
        incidentStart: event.incidentStart,
        incidentEnd: event.incidentEnd,
        failureCount,
      };
    }

    await this.attempt(log, 'Failed to update target status', () =>
      this.store.updateTargetStatus(target.id, {
        ...next,
        lastChecked: now,
        lastStatusCode: result.statusCode,
        lastResponseTimeMs: result.latencyMs,
        lastError: result.error,
      })
    );

    const pending = notification;
    if (pending) {
      await this.attempt(log, 'Failed to dispatch notification', () => this.notifier.dispatch(pending));
    }

    return { previous, next, event };
  }

  /**
   * Run one side effect; a failure is logged and yields null
   */
  private async attempt<T>(
    log: Logger,
    message: string,
    operation: () => Promise<T>
  ): Promise<T | null> {
    try {
      return await operation();
    } catch (error) {
      log.error(message, { error: errorMessage(error) });
      return null;
    }
  }
}

/**
 * Lower bound for counting an incident's failed checks. The backdated start
 * is approximate, so the first failing check may sit a little before it;
 * half an interval back still excludes the preceding successful check.
 */
export function failureCountStart(incidentStart: Date, checkIntervalSeconds: number): Date {
  return new Date(incidentStart.getTime() - (checkIntervalSeconds * 1000) / 2);
}
