import type { BaselineStats } from '../../lib/types/monitoring';

/** Scales a MAD to a standard deviation under normality */
export const MAD_CONSISTENCY = 1.4826;

export const UCL_SIGMAS = 3;

export const BASELINE_EWMA_ALPHA = 0.3;

const EMPTY_BASELINE: BaselineStats = {
  windowSize: 0,
  median: 0,
  mad: 0,
  ewma: 0,
  ucl: 0,
  p95: 0,
};

export function median(samples: readonly number[]): number {
  if (samples.length === 0) {
    return 0;
  }

  const sorted = [...samples].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);

  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Median of absolute deviations from the median
 */
export function medianAbsoluteDeviation(samples: readonly number[], center = median(samples)): number {
  if (samples.length === 0) {
    return 0;
  }
  return median(samples.map((value) => Math.abs(value - center)));
}

/**
 * Exponentially weighted moving average seeded with the first sample,
 * folded left to right in arrival order
 */
export function ewma(samples: readonly number[], alpha = BASELINE_EWMA_ALPHA): number {
  if (samples.length === 0) {
    return 0;
  }

  let value = samples[0];
  for (let i = 1; i < samples.length; i++) {
    value = alpha * samples[i] + (1 - alpha) * value;
  }
  return value;
}

/**
 * Nearest-rank percentile: the sorted value at 1-indexed rank ceil(q * n),
 * clamped to the last element
 */
export function percentile(samples: readonly number[], q: number): number {
  if (samples.length === 0) {
    return 0;
  }

  const sorted = [...samples].sort((a, b) => a - b);
  const rank = Math.ceil(q * sorted.length);
  const index = Math.min(Math.max(rank, 1), sorted.length) - 1;

  return sorted[index];
}

export function upperControlLimit(center: number, mad: number): number {
  return center + UCL_SIGMAS * MAD_CONSISTENCY * mad;
}

/**
 * Baseline statistics over an ordered window of latency samples (ms).
 * An empty window yields an all-zero baseline.
 */
export function computeBaseline(samples: readonly number[]): BaselineStats {
  if (samples.length === 0) {
    return { ...EMPTY_BASELINE };
  }

  const center = median(samples);
  const mad = medianAbsoluteDeviation(samples, center);

  return {
    windowSize: samples.length,
    median: center,
    mad,
    ewma: ewma(samples),
    ucl: upperControlLimit(center, mad),
    p95: percentile(samples, 0.95),
  };
}
