import { MonitorScheduler, msUntilNextDailyRun } from '../../../../src/services/scheduler';
import type { CheckRunner, MaintenanceJobs } from '../../../../src/services/scheduler';
import type { MonitoringSettings } from '../../../../src/config/settings';
import type { MonitoredTarget } from '../../../../src/lib/types/target';
import { buildTarget } from '../../../fixtures/targets';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
}

describe('MonitorScheduler', () => {
  const settings: MonitoringSettings = {
    failureThreshold: 3,
    recoveryThreshold: 2,
    requestRetries: 3,
    requestBackoffSeconds: 0.5,
    initialDelaySeconds: 2,
    downtimeReminderMinutes: 30,
    reminderSweepMinutes: 5,
    retentionDays: 30,
    digestTime: '09:00',
    anomaly: {
      enabled: true,
      window: 200,
      computeIntervalMinutes: 15,
      cooldownMinutes: 30,
      m: 3,
      n: 5,
      sensitivity: 1.5,
      pctFactor: 1.2,
    },
  };

  let activeTargets: MonitoredTarget[];
  let checkTarget: jest.Mock;
  let jobs: { [K in keyof MaintenanceJobs]: jest.Mock };
  let scheduler: MonitorScheduler;

  function build(overrides: Partial<MonitoringSettings> = {}): MonitorScheduler {
    const runner: CheckRunner = { checkTarget };
    return new MonitorScheduler(
      { listActiveTargets: async () => activeTargets },
      runner,
      jobs,
      { ...settings, ...overrides }
    );
  }

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-03-01T08:00:00Z'));
    activeTargets = [];
    checkTarget = jest.fn().mockResolvedValue(undefined);
    jobs = {
      recomputeBaselines: jest.fn().mockResolvedValue({ computed: 0, failed: 0 }),
      sendDownReminders: jest.fn().mockResolvedValue(0),
      purgeExpiredData: jest.fn().mockResolvedValue({ checksDeleted: 0, anomaliesDeleted: 0, baselinesDeleted: 0 }),
      sendDailyDigest: jest.fn().mockResolvedValue(0),
    };
    scheduler = build();
  });

  afterEach(async () => {
    await scheduler.stop();
    jest.useRealTimers();
  });

  describe('target timers', () => {
    it('should check after the initial delay and then every interval', async () => {
      activeTargets = [buildTarget({ id: 1, checkIntervalSeconds: 60 })];
      await scheduler.start();

      await jest.advanceTimersByTimeAsync(1999);
      expect(checkTarget).not.toHaveBeenCalled();

      await jest.advanceTimersByTimeAsync(1);
      expect(checkTarget).toHaveBeenCalledTimes(1);
      expect(checkTarget).toHaveBeenCalledWith(1);

      await jest.advanceTimersByTimeAsync(60000);
      expect(checkTarget).toHaveBeenCalledTimes(2);

      await jest.advanceTimersByTimeAsync(120000);
      expect(checkTarget).toHaveBeenCalledTimes(4);
    });

    it('should keep a single timer per target across reschedules', async () => {
      const target = buildTarget({ id: 1, checkIntervalSeconds: 60 });
      scheduler.schedule(target);
      scheduler.schedule({ ...target, checkIntervalSeconds: 30 });

      expect(scheduler.scheduledCount).toBe(1);

      await jest.advanceTimersByTimeAsync(2000 + 60000);
      // first check at 2s, then 32s and 62s on the new interval
      expect(checkTarget).toHaveBeenCalledTimes(3);
    });

    it('should not schedule an inactive target', () => {
      scheduler.schedule(buildTarget({ id: 1, isActive: false }));

      expect(scheduler.isScheduled(1)).toBe(false);
    });

    it('should stop checking after unschedule', async () => {
      scheduler.schedule(buildTarget({ id: 1 }));
      await jest.advanceTimersByTimeAsync(2000);

      scheduler.unschedule(1);
      await jest.advanceTimersByTimeAsync(300000);

      expect(checkTarget).toHaveBeenCalledTimes(1);
      expect(scheduler.isScheduled(1)).toBe(false);
    });
  });

  describe('fire', () => {
    it('should skip a firing while the previous check of the target is running', async () => {
      const pending = deferred();
      checkTarget.mockReturnValueOnce(pending.promise);

      scheduler.fire(1);
      scheduler.fire(1);
      scheduler.fire(2);

      expect(checkTarget).toHaveBeenCalledTimes(2);
      expect(checkTarget).toHaveBeenNthCalledWith(1, 1);
      expect(checkTarget).toHaveBeenNthCalledWith(2, 2);

      pending.resolve();
      await scheduler.stop();

      scheduler.fire(1);
      expect(checkTarget).toHaveBeenCalledTimes(3);
    });

    it('should release the lease when a check rejects', async () => {
      checkTarget.mockRejectedValueOnce(new Error('boom'));

      scheduler.fire(1);
      await scheduler.stop();
      scheduler.fire(1);

      expect(checkTarget).toHaveBeenCalledTimes(2);
    });
  });

  describe('stop', () => {
    it('should wait for in-flight checks', async () => {
      const pending = deferred();
      checkTarget.mockReturnValueOnce(pending.promise);
      await scheduler.start();
      scheduler.fire(1);

      let stopped = false;
      const stopping = scheduler.stop().then(() => {
        stopped = true;
      });
      await Promise.resolve();
      expect(stopped).toBe(false);
      expect(scheduler.inFlightCount).toBe(1);

      pending.resolve();
      await stopping;

      expect(stopped).toBe(true);
      expect(scheduler.inFlightCount).toBe(0);
      expect(scheduler.running).toBe(false);
    });

    it('should clear every timer', async () => {
      activeTargets = [buildTarget({ id: 1 }), buildTarget({ id: 2 })];
      await scheduler.start();
      expect(scheduler.running).toBe(true);

      await scheduler.stop();
      await jest.advanceTimersByTimeAsync(24 * 60 * 60 * 1000);

      expect(scheduler.scheduledCount).toBe(0);
      expect(checkTarget).not.toHaveBeenCalled();
      expect(jobs.sendDownReminders).not.toHaveBeenCalled();
    });
  });

  describe('maintenance', () => {
    it('should run baseline, reminder and digest jobs on their timers', async () => {
      await scheduler.start();

      await jest.advanceTimersByTimeAsync(15 * 60 * 1000);
      expect(jobs.recomputeBaselines).toHaveBeenCalledTimes(1);
      expect(jobs.sendDownReminders).toHaveBeenCalledTimes(3);
      expect(jobs.sendDailyDigest).not.toHaveBeenCalled();

      // digest at 09:00 UTC, one hour after the start
      await jest.advanceTimersByTimeAsync(45 * 60 * 1000);
      expect(jobs.sendDailyDigest).toHaveBeenCalledTimes(1);
    });

    it('should not run baselines when anomaly detection is off', async () => {
      scheduler = build({ anomaly: { ...settings.anomaly, enabled: false } });
      await scheduler.start();

      await jest.advanceTimersByTimeAsync(60 * 60 * 1000);

      expect(jobs.recomputeBaselines).not.toHaveBeenCalled();
    });

    it('should skip a job that is still running', async () => {
      const pending = deferred();
      jobs.purgeExpiredData.mockReturnValueOnce(pending.promise);

      const first = scheduler.runJob('retention');
      await scheduler.runJob('retention');
      pending.resolve();
      await first;

      expect(jobs.purgeExpiredData).toHaveBeenCalledTimes(1);
    });

    it('should contain job failures', async () => {
      jobs.sendDownReminders.mockRejectedValueOnce(new Error('store down'));

      await expect(scheduler.runJob('reminders')).resolves.toBeUndefined();
    });

    it('should pass the run time to the job', async () => {
      const now = new Date('2026-03-01T09:00:00Z');

      await scheduler.runJob('digest', now);

      expect(jobs.sendDailyDigest).toHaveBeenCalledWith(now);
    });
  });

  describe('msUntilNextDailyRun', () => {
    it('should count forward to today when the time is still ahead', () => {
      expect(msUntilNextDailyRun(new Date('2026-03-01T08:00:00Z'), '09:00')).toBe(60 * 60 * 1000);
    });

    it('should roll over to tomorrow once the time has passed', () => {
      expect(msUntilNextDailyRun(new Date('2026-03-01T09:00:00Z'), '09:00')).toBe(24 * 60 * 60 * 1000);
      expect(msUntilNextDailyRun(new Date('2026-03-01T10:30:00Z'), '09:00')).toBe(22.5 * 60 * 60 * 1000);
    });
  });
});
