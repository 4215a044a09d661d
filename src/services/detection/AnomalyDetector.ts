import type { MonitoringStore } from '../../lib/clients/database';
import type { AnomalySettings } from '../../config/settings';
import { createChildLogger } from '../../lib/utils/logger';
import { anomaliesDetected } from '../../lib/utils/metrics';
import type { AnomalyReason } from '../../lib/types/monitoring';
import { isTargetMuted, type MonitoredTarget } from '../../lib/types/target';
import { percentile } from '../statistics';
import type { Notifier } from '../notification/types';
import type { AnomalyDecision, BaselineProvider } from './types';

/** Successful samples behind the percentile floor */
export const RECENT_P95_WINDOW = 50;

export interface EffectiveTuning {
  sensitivity: number;
  m: number;
  n: number;
}

export class AnomalyDetector {
  constructor(
    private readonly store: Pick<
      MonitoringStore,
      'getRecentSuccessfulLatencies' | 'getLastAnomalyTime' | 'appendAnomalyEvent'
    >,
    private readonly baselines: BaselineProvider,
    private readonly notifier: Notifier,
    private readonly settings: Readonly<AnomalySettings>
  ) {}

  /**
   * Decide whether a fresh successful latency sample is anomalous.
   *
   * The sample must already be in the target's history: the m-of-n window
   * counts it.
   */
  async evaluate(target: MonitoredTarget, latencyMs: number, now: Date = new Date()): Promise<AnomalyDecision> {
    if (!this.settings.enabled || !target.anomalyAlertsEnabled) {
      return { outcome: 'disabled' };
    }

    const baseline = await this.baselines.getLatestBaseline(target.id);
    if (!baseline || baseline.ucl <= 0) {
      return { outcome: 'insufficient_data' };
    }

    const log = createChildLogger(`target:${target.id}`);
    const tuning = this.tuningFor(target);

    const recent = await this.store.getRecentSuccessfulLatencies(
      target.id,
      Math.max(RECENT_P95_WINDOW, tuning.n)
    );

    const uclBound = baseline.ucl * tuning.sensitivity;
    const p95Bound = percentile(recent.slice(-RECENT_P95_WINDOW), 0.95) * this.settings.pctFactor;
    const threshold = Math.max(uclBound, p95Bound);

    if (latencyMs <= threshold) {
      return { outcome: 'normal', threshold };
    }

    const exceeding = recent.slice(-tuning.n).filter((sample) => sample > threshold).length;
    if (exceeding < tuning.m) {
      log.debug('Latency spike debounced', { latencyMs, threshold, exceeding, required: tuning.m });
      return { outcome: 'debounced', threshold, exceeding, required: tuning.m };
    }

    const cooldownMs = this.cooldownFor(latencyMs, threshold);
    const lastAnomaly = await this.store.getLastAnomalyTime(target.id);
    if (lastAnomaly) {
      const elapsedMs = now.getTime() - lastAnomaly.getTime();
      if (elapsedMs < cooldownMs) {
        return { outcome: 'cooldown', threshold, remainingMs: cooldownMs - elapsedMs };
      }
    }

    const reason: AnomalyReason = uclBound >= p95Bound ? 'ucl_exceeded' : 'p95_exceeded';
    const event = await this.store.appendAnomalyEvent({
      targetId: target.id,
      timestamp: now,
      latencyMs,
      deviationScore: latencyMs - threshold,
      reason,
    });
    anomaliesDetected.inc({ target_id: String(target.id) });

    log.warn('Latency anomaly detected', { latencyMs, threshold, reason, exceeding });

    const muted = isTargetMuted(target, now);
    if (!muted) {
      await this.notifier.dispatch({
        kind: 'anomaly',
        target,
        event,
        threshold,
        baselineMedian: baseline.median,
      });
    }

    return { outcome: 'anomaly', threshold, event, notified: !muted };
  }

  tuningFor(target: MonitoredTarget): EffectiveTuning {
    const m = target.anomalyM ?? this.settings.m;
    return {
      sensitivity: target.anomalySensitivity ?? this.settings.sensitivity,
      m,
      n: Math.max(target.anomalyN ?? this.settings.n, m),
    };
  }

  /**
   * Configured cooldown, shortened for severe deviations
   */
  cooldownFor(latencyMs: number, threshold: number): number {
    const ratio = (latencyMs - threshold) / threshold;
    const scale = ratio > 0.5 ? 0.5 : ratio > 0.25 ? 0.75 : 1;
    return this.settings.cooldownMinutes * 60 * 1000 * scale;
  }
}
