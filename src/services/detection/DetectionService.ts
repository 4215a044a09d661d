import type { MonitoringStore } from '../../lib/clients/database';
import { errorMessage } from '../../lib/utils/errors';
import logger, { createChildLogger } from '../../lib/utils/logger';
import { checksTotal, responseTime, targetsDown } from '../../lib/utils/metrics';
import type { CheckResult } from '../../lib/types/monitoring';
import type { CheckExecutor } from '../checks';
import type { CheckRunner } from '../scheduler/types';
import type { AnomalyDetector } from './AnomalyDetector';
import type { IncidentTracker, TrackerOutcome } from './IncidentTracker';
import type { AnomalyDecision } from './types';

export type CheckTargetOutcome =
  | { status: 'skipped'; reason: 'not_found' | 'inactive' | 'misconfigured' }
  | {
      status: 'checked';
      result: CheckResult;
      transition: TrackerOutcome;
      anomaly: AnomalyDecision | null;
    };

/**
 * One full check cycle for one target: probe, track state, evaluate latency
 */
export class DetectionService implements CheckRunner {
  constructor(
    private readonly store: Pick<MonitoringStore, 'getTarget' | 'listTargets'>,
    private readonly executor: CheckExecutor,
    private readonly tracker: IncidentTracker,
    private readonly detector: AnomalyDetector
  ) {}

  async checkTarget(targetId: number): Promise<CheckTargetOutcome> {
    const log = createChildLogger(`target:${targetId}`);

    const target = await this.store.getTarget(targetId);
    if (!target) {
      log.warn('Scheduled target no longer exists');
      return { status: 'skipped', reason: 'not_found' };
    }
    if (!target.isActive) {
      log.debug('Target is paused, skipping check');
      return { status: 'skipped', reason: 'inactive' };
    }

    let result: CheckResult;
    try {
      result = await this.executor.executeCheck(target);
    } catch (error) {
      log.error('Target cannot be probed', { url: target.url, error: errorMessage(error) });
      return { status: 'skipped', reason: 'misconfigured' };
    }

    const labels = { target_id: String(targetId) };
    checksTotal.inc({ ...labels, outcome: result.success ? 'success' : 'failure' });
    if (result.latencyMs >= 0) {
      responseTime.observe(labels, result.latencyMs);
    }

    const transition = await this.tracker.process(target, result);
    if (transition.event.type === 'down') {
      targetsDown.inc();
    } else if (transition.event.type === 'recovered') {
      targetsDown.dec();
    }

    let anomaly: AnomalyDecision | null = null;
    if (result.success && result.latencyMs > 0) {
      try {
        anomaly = await this.detector.evaluate(target, result.latencyMs, result.timestamp);
      } catch (error) {
        log.error('Anomaly evaluation failed', { error: errorMessage(error) });
      }
    }

    return { status: 'checked', result, transition, anomaly };
  }

  /**
   * Reset the DOWN gauge from stored state
   */
  async refreshDownGauge(): Promise<number> {
    const targets = await this.store.listTargets();
    const down = targets.filter((target) => target.isActive && !target.isUp).length;
    targetsDown.set(down);
    logger.debug('Targets down gauge refreshed', { down });
    return down;
  }
}
