import { MaintenanceService } from '../../../../src/services/maintenance';
import type { DispatchSummary, NotificationEvent, Notifier } from '../../../../src/services/notification';
import { InMemoryStore } from '../../../fixtures/InMemoryStore';
import { buildTarget, failedResult, okResult } from '../../../fixtures/targets';

class RecordingNotifier implements Notifier {
  events: NotificationEvent[] = [];

  async dispatch(event: NotificationEvent): Promise<DispatchSummary> {
    this.events.push(event);
    return { kind: event.kind, recipients: 1, delivered: 1, failed: 0, results: [] };
  }
}

describe('MaintenanceService', () => {
  const now = new Date('2026-03-10T09:00:00Z');
  const minutesAgo = (minutes: number): Date => new Date(now.getTime() - minutes * 60 * 1000);
  const daysAgo = (days: number): Date => new Date(now.getTime() - days * 24 * 60 * 60 * 1000);

  let store: InMemoryStore;
  let notifier: RecordingNotifier;
  let recomputeAll: jest.Mock;
  let service: MaintenanceService;

  beforeEach(() => {
    store = new InMemoryStore();
    notifier = new RecordingNotifier();
    recomputeAll = jest.fn().mockResolvedValue({ computed: 2, failed: 0 });
    service = new MaintenanceService(store, notifier, { recomputeAll }, { downtimeReminderMinutes: 30, retentionDays: 30 });
  });

  describe('sendDownReminders', () => {
    it('should remind about a DOWN target that has no reminder yet', async () => {
      store.seed(buildTarget({ id: 1, isUp: false, incidentStartTime: minutesAgo(90) }));

      expect(await service.sendDownReminders(now)).toBe(1);
      expect(notifier.events).toEqual([
        { kind: 'reminder', target: expect.objectContaining({ id: 1 }), incidentStart: minutesAgo(90), now },
      ]);
      expect(await store.getLastReminderTime(1)).toEqual(now);
    });

    it('should ignore a reminder left over from an earlier incident', async () => {
      store.seed(buildTarget({ id: 1, isUp: false, incidentStartTime: minutesAgo(10) }));
      await store.setLastReminderTime(1, minutesAgo(15));

      expect(await service.sendDownReminders(now)).toBe(1);
      expect(notifier.events[0]).toMatchObject({ kind: 'reminder', incidentStart: minutesAgo(10) });
      expect(await store.getLastReminderTime(1)).toEqual(now);
    });

    it('should wait for the reminder interval to pass', async () => {
      store.seed(buildTarget({ id: 1, isUp: false, incidentStartTime: minutesAgo(90) }));
      await store.setLastReminderTime(1, minutesAgo(20));

      expect(await service.sendDownReminders(now)).toBe(0);

      await store.setLastReminderTime(1, minutesAgo(30));
      expect(await service.sendDownReminders(now)).toBe(1);
    });

    it('should skip targets that are UP, muted or paused', async () => {
      store.seed(buildTarget({ id: 1, isUp: true }));
      store.seed(buildTarget({ id: 2, isUp: false, muted: true, mutedUntil: null }));
      store.seed(buildTarget({ id: 3, isUp: false, isActive: false }));

      expect(await service.sendDownReminders(now)).toBe(0);
      expect(notifier.events).toHaveLength(0);
    });

    it('should carry on after a failing target', async () => {
      store.seed(buildTarget({ id: 1, isUp: false }));
      store.seed(buildTarget({ id: 2, isUp: false }));
      jest.spyOn(store, 'getLastReminderTime').mockRejectedValueOnce(new Error('deadlock'));

      expect(await service.sendDownReminders(now)).toBe(1);
      expect(await store.getLastReminderTime(2)).toEqual(now);
    });
  });

  describe('purgeExpiredData', () => {
    it('should delete rows older than the retention period', async () => {
      store.seed(buildTarget({ id: 1 }));
      await store.appendCheckResult(okResult(1, daysAgo(31)));
      await store.appendCheckResult(okResult(1, daysAgo(29)));
      await store.appendAnomalyEvent({
        targetId: 1,
        timestamp: daysAgo(40),
        latencyMs: 900,
        deviationScore: 400,
        reason: 'ucl_exceeded',
      });

      const result = await service.purgeExpiredData(now);

      expect(result).toEqual({ checksDeleted: 1, anomaliesDeleted: 1, baselinesDeleted: 0 });
      expect(store.checks).toHaveLength(1);
    });
  });

  describe('sendDailyDigest', () => {
    it('should send nothing without active targets', async () => {
      expect(await service.sendDailyDigest(now)).toBe(0);
      expect(notifier.events).toHaveLength(0);
    });

    it('should summarise the last 24 hours of each active target', async () => {
      store.seed(buildTarget({ id: 1, name: 'Checkout' }));
      await store.appendCheckResult(okResult(1, minutesAgo(60), 100));
      await store.appendCheckResult(okResult(1, minutesAgo(30), 300));
      await store.appendCheckResult(failedResult(1, minutesAgo(10)));
      await store.appendCheckResult(failedResult(1, daysAgo(2)));

      expect(await service.sendDailyDigest(now)).toBe(1);

      expect(notifier.events).toHaveLength(1);
      const digest = notifier.events[0];
      if (digest.kind !== 'digest') {
        throw new Error(`unexpected ${digest.kind}`);
      }
      expect(digest.generatedAt).toEqual(now);
      expect(digest.entries[0].target).toEqual({ id: 1, name: 'Checkout', isUp: true });
      expect(digest.entries[0].stats).toMatchObject({
        since: daysAgo(1),
        totalChecks: 3,
        okChecks: 2,
        avgResponseTimeMs: 200,
      });
      expect(digest.entries[0].stats.uptimePercent).toBeCloseTo(66.667, 2);
    });
  });

  it('should delegate baseline recomputation', async () => {
    expect(await service.recomputeBaselines(now)).toEqual({ computed: 2, failed: 0 });
    expect(recomputeAll).toHaveBeenCalledWith(now);
  });
});
