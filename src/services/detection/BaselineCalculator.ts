import { z } from 'zod';
import type { MonitoringStore } from '../../lib/clients/database';
import type { AnomalySettings } from '../../config/settings';
import { errorMessage } from '../../lib/utils/errors';
import logger from '../../lib/utils/logger';
import { baselineMad, baselineMedian, baselineP95, baselineUcl } from '../../lib/utils/metrics';
import { safeValidate } from '../../lib/utils/validation';
import type { Baseline } from '../../lib/types/monitoring';
import { computeBaseline } from '../statistics';
import type { BaselineProvider } from './types';

/**
 * Key/value cache for the latest baseline; satisfied by RedisClient
 */
export interface BaselineCache {
  get(key: string, cacheType?: string): Promise<string | null>;
  setex(key: string, ttl: number, value: string): Promise<void>;
}

export interface RecomputeSummary {
  computed: number;
  failed: number;
}

const cachedBaselineSchema = z.object({
  targetId: z.number().int(),
  computedAt: z.coerce.date(),
  windowSize: z.number().int().nonnegative(),
  median: z.number(),
  mad: z.number(),
  ewma: z.number(),
  ucl: z.number(),
  p95: z.number(),
});

export class BaselineCalculator implements BaselineProvider {
  constructor(
    private readonly store: Pick<
      MonitoringStore,
      'listActiveTargets' | 'getRecentSuccessfulLatencies' | 'appendBaseline' | 'getLatestBaseline'
    >,
    private readonly settings: Pick<AnomalySettings, 'window'>,
    private readonly cache: BaselineCache | null = null,
    private readonly cacheTtlSeconds: number = 86400
  ) {}

  /**
   * Recompute and append a baseline snapshot for every active target.
   * A failing target is logged and skipped.
   */
  async recomputeAll(now: Date = new Date()): Promise<RecomputeSummary> {
    const targets = await this.store.listActiveTargets();
    const summary: RecomputeSummary = { computed: 0, failed: 0 };

    for (const target of targets) {
      try {
        await this.recompute(target.id, now);
        summary.computed++;
      } catch (error) {
        summary.failed++;
        logger.error('Failed to recompute baseline', {
          targetId: target.id,
          error: errorMessage(error),
        });
      }
    }

    logger.info('Baselines recomputed', { ...summary, targets: targets.length });
    return summary;
  }

  async recompute(targetId: number, now: Date = new Date()): Promise<Baseline> {
    const latencies = await this.store.getRecentSuccessfulLatencies(targetId, this.settings.window);
    const samples = latencies.filter((value) => value > 0);

    const baseline: Baseline = {
      targetId,
      computedAt: now,
      ...computeBaseline(samples),
    };

    await this.store.appendBaseline(baseline);
    this.updateGauges(baseline);
    await this.writeCache(baseline);

    logger.debug('Calculated baseline', {
      targetId,
      windowSize: baseline.windowSize,
      median: baseline.median,
      mad: baseline.mad,
      ucl: baseline.ucl,
      p95: baseline.p95,
    });

    return baseline;
  }

  /**
   * Latest baseline for a target: cache first, then the store
   */
  async getLatestBaseline(targetId: number): Promise<Baseline | null> {
    const cached = await this.readCache(targetId);
    if (cached) {
      return cached;
    }

    const baseline = await this.store.getLatestBaseline(targetId);
    if (baseline) {
      await this.writeCache(baseline);
    }
    return baseline;
  }

  private async readCache(targetId: number): Promise<Baseline | null> {
    if (!this.cache) {
      return null;
    }

    try {
      const raw = await this.cache.get(this.getCacheKey(targetId), 'baseline');
      if (raw === null) {
        return null;
      }

      const parsed = safeValidate(cachedBaselineSchema, JSON.parse(raw));
      if (!parsed.success) {
        logger.warn('Discarding malformed cached baseline', { targetId });
        return null;
      }
      return parsed.data;
    } catch (error) {
      logger.warn('Baseline cache read failed, using store', { targetId, error: errorMessage(error) });
      return null;
    }
  }

  private async writeCache(baseline: Baseline): Promise<void> {
    if (!this.cache) {
      return;
    }

    try {
      await this.cache.setex(
        this.getCacheKey(baseline.targetId),
        this.cacheTtlSeconds,
        JSON.stringify(baseline)
      );
    } catch (error) {
      logger.warn('Baseline cache write failed', {
        targetId: baseline.targetId,
        error: errorMessage(error),
      });
    }
  }

  private updateGauges(baseline: Baseline): void {
    const labels = { target_id: String(baseline.targetId) };
    baselineMedian.set(labels, baseline.median);
    baselineMad.set(labels, baseline.mad);
    baselineUcl.set(labels, baseline.ucl);
    baselineP95.set(labels, baseline.p95);
  }

  /**
   * Generate cache key for baseline
   */
  private getCacheKey(targetId: number): string {
    return `pulsewatch:baseline:${targetId}`;
  }
}
