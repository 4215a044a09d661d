import { AnomalyDetector, DetectionService, IncidentTracker } from '../../../../src/services/detection';
import type { BaselineProvider } from '../../../../src/services/detection';
import { CheckExecutor } from '../../../../src/services/checks';
import type { AnomalySettings } from '../../../../src/config/settings';
import type { Baseline } from '../../../../src/lib/types/monitoring';
import type { Notifier } from '../../../../src/services/notification';
import { targetsDown } from '../../../../src/lib/utils/metrics';
import { InMemoryStore } from '../../../fixtures/InMemoryStore';
import { buildTarget, failedResult, okResult } from '../../../fixtures/targets';

const mockChildLogger = {
  info: jest.fn(),
  debug: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
};

// Mock logger
jest.mock('../../../../src/lib/utils/logger', () => {
  const base = { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() };
  return {
    __esModule: true,
    default: base,
    logger: base,
    createChildLogger: jest.fn(() => mockChildLogger),
  };
});

describe('DetectionService', () => {
  const now = new Date('2026-03-01T12:00:00Z');
  const settings: AnomalySettings = {
    enabled: true,
    window: 200,
    computeIntervalMinutes: 15,
    cooldownMinutes: 30,
    m: 1,
    n: 1,
    sensitivity: 1,
    pctFactor: 1.2,
  };
  const baseline: Baseline = {
    targetId: 1,
    computedAt: now,
    windowSize: 200,
    median: 100,
    mad: 10,
    ewma: 100,
    ucl: 150,
    p95: 120,
  };

  let store: InMemoryStore;
  let dispatch: jest.Mock;
  let executor: CheckExecutor;
  let detector: AnomalyDetector;
  let service: DetectionService;

  async function gaugeValue(): Promise<number> {
    const metric = await targetsDown.get();
    return metric.values[0]?.value ?? 0;
  }

  beforeEach(() => {
    store = new InMemoryStore();
    dispatch = jest.fn().mockResolvedValue({ kind: 'down', recipients: 1, delivered: 1, failed: 0, results: [] });
    const notifier: Notifier = { dispatch };
    const baselines: BaselineProvider = { getLatestBaseline: async () => baseline };

    executor = new CheckExecutor({ requestRetries: 1, requestBackoffSeconds: 0.001 }, { request: jest.fn() });
    const tracker = new IncidentTracker(store, notifier, { failureThreshold: 2, recoveryThreshold: 1 });
    detector = new AnomalyDetector(store, baselines, notifier, settings);
    service = new DetectionService(store, executor, tracker, detector);

    store.seed(buildTarget({ id: 1 }));
    targetsDown.set(0);
  });

  it('should skip a target that no longer exists', async () => {
    expect(await service.checkTarget(42)).toEqual({ status: 'skipped', reason: 'not_found' });
  });

  it('should skip a paused target without probing it', async () => {
    store.seed(buildTarget({ id: 2, isActive: false }));
    const probe = jest.spyOn(executor, 'executeCheck');

    expect(await service.checkTarget(2)).toEqual({ status: 'skipped', reason: 'inactive' });
    expect(probe).not.toHaveBeenCalled();
  });

  it('should skip a target whose URL cannot be probed', async () => {
    store.seed(buildTarget({ id: 3, url: 'not a url' }));

    expect(await service.checkTarget(3)).toEqual({ status: 'skipped', reason: 'misconfigured' });
    expect(store.checks).toHaveLength(0);
    expect(mockChildLogger.error).toHaveBeenCalledWith('Target cannot be probed', {
      url: 'not a url',
      error: 'Malformed URL: not a url',
    });
  });

  it('should evaluate anomalies after the sample is recorded', async () => {
    for (let i = 49; i > 0; i--) {
      store.checks.push(okResult(1, new Date(now.getTime() - i * 60 * 1000), 100));
    }
    jest.spyOn(executor, 'executeCheck').mockResolvedValue(okResult(1, now, 400));

    const outcome = await service.checkTarget(1);

    expect(outcome.status).toBe('checked');
    if (outcome.status !== 'checked') {
      return;
    }
    expect(outcome.anomaly).toMatchObject({ outcome: 'anomaly', threshold: 150, notified: true });
    expect(store.anomalies).toEqual([
      { id: expect.any(Number), targetId: 1, timestamp: now, latencyMs: 400, deviationScore: 250, reason: 'ucl_exceeded' },
    ]);
    expect(dispatch).toHaveBeenCalledWith(expect.objectContaining({ kind: 'anomaly', threshold: 150 }));
  });

  it('should not evaluate failed checks', async () => {
    jest.spyOn(executor, 'executeCheck').mockResolvedValue(failedResult(1, now));
    const evaluate = jest.spyOn(detector, 'evaluate');

    const outcome = await service.checkTarget(1);

    expect(outcome).toMatchObject({ status: 'checked', anomaly: null });
    expect(store.checks).toHaveLength(1);
    expect(evaluate).not.toHaveBeenCalled();
  });

  it('should not evaluate a success without a measured latency', async () => {
    jest.spyOn(executor, 'executeCheck').mockResolvedValue(okResult(1, now, 0));
    const evaluate = jest.spyOn(detector, 'evaluate');

    await service.checkTarget(1);

    expect(evaluate).not.toHaveBeenCalled();
  });

  it('should log a failed anomaly evaluation and still complete the check', async () => {
    jest.spyOn(executor, 'executeCheck').mockResolvedValue(okResult(1, now, 400));
    jest.spyOn(detector, 'evaluate').mockRejectedValue(new Error('store unavailable'));

    const outcome = await service.checkTarget(1);

    expect(outcome).toMatchObject({ status: 'checked', anomaly: null });
    expect((await store.getTarget(1))?.lastResponseTimeMs).toBe(400);
    expect(mockChildLogger.error).toHaveBeenCalledWith('Anomaly evaluation failed', {
      error: 'store unavailable',
    });
  });

  it('should move the DOWN gauge with transitions', async () => {
    const probe = jest.spyOn(executor, 'executeCheck');
    probe.mockResolvedValueOnce(failedResult(1, now));
    probe.mockResolvedValueOnce(failedResult(1, new Date(now.getTime() + 60 * 1000)));
    probe.mockResolvedValueOnce(okResult(1, new Date(now.getTime() + 120 * 1000), 0));

    await service.checkTarget(1);
    expect(await gaugeValue()).toBe(0);

    await service.checkTarget(1);
    expect(await gaugeValue()).toBe(1);

    await service.checkTarget(1);
    expect(await gaugeValue()).toBe(0);
  });

  it('should rebuild the DOWN gauge from active targets', async () => {
    store.seed(buildTarget({ id: 5, isUp: false }));
    store.seed(buildTarget({ id: 6, isUp: false, isActive: false }));

    expect(await service.refreshDownGauge()).toBe(1);
    expect(await gaugeValue()).toBe(1);
  });
});
