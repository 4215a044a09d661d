import type { MonitoringStore } from '../../lib/clients/database';
import type { MonitoringSettings } from '../../config/settings';
import { errorMessage } from '../../lib/utils/errors';
import logger from '../../lib/utils/logger';
import { checksSkipped, maintenanceRuns } from '../../lib/utils/metrics';
import type { MonitoredTarget } from '../../lib/types/target';
import type { ScheduleListener } from '../detection/types';
import { CheckLease } from './CheckLease';
import type { CheckRunner, MaintenanceJobName, MaintenanceJobs } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

interface TargetTimer {
  intervalSeconds: number;
  initial: NodeJS.Timeout | null;
  recurring: NodeJS.Timeout | null;
}

/**
 * Owns one recurring timer per active target plus the maintenance timers.
 */
export class MonitorScheduler implements ScheduleListener {
  private readonly timers = new Map<number, TargetTimer>();
  private readonly maintenanceTimers: NodeJS.Timeout[] = [];
  private readonly runningJobs = new Set<MaintenanceJobName>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly lease = new CheckLease();
  private isRunning = false;

  constructor(
    private readonly store: Pick<MonitoringStore, 'listActiveTargets'>,
    private readonly runner: CheckRunner,
    private readonly jobs: MaintenanceJobs,
    private readonly settings: MonitoringSettings
  ) {}

  /**
   * Schedule every active target and start the maintenance timers
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Scheduler already running');
      return;
    }

    logger.info('Starting scheduler');

    const targets = await this.store.listActiveTargets();
    for (const target of targets) {
      this.schedule(target);
    }

    this.startMaintenance();
    this.isRunning = true;

    logger.info('Scheduler started', { targetCount: targets.length });
  }

  /**
   * Clear every timer and wait for in-flight checks to finish
   */
  async stop(): Promise<void> {
    for (const targetId of [...this.timers.keys()]) {
      this.unschedule(targetId);
    }

    for (const timer of this.maintenanceTimers) {
      clearTimeout(timer);
      clearInterval(timer);
    }
    this.maintenanceTimers.length = 0;

    await Promise.allSettled([...this.inFlight]);
    this.isRunning = false;

    logger.info('Scheduler stopped');
  }

  /**
   * Replace the target's timer; an inactive target ends up with none
   */
  schedule(target: MonitoredTarget): void {
    this.clearTimer(target.id);

    if (!target.isActive) {
      return;
    }

    const entry: TargetTimer = {
      intervalSeconds: target.checkIntervalSeconds,
      initial: null,
      recurring: null,
    };

    entry.initial = setTimeout(() => {
      entry.initial = null;
      this.fire(target.id);
      entry.recurring = setInterval(() => this.fire(target.id), target.checkIntervalSeconds * 1000);
    }, this.settings.initialDelaySeconds * 1000);

    this.timers.set(target.id, entry);

    logger.debug('Target scheduled', {
      targetId: target.id,
      intervalSeconds: target.checkIntervalSeconds,
    });
  }

  unschedule(targetId: number): void {
    if (this.clearTimer(targetId)) {
      logger.debug('Target unscheduled', { targetId });
    }
  }

  isScheduled(targetId: number): boolean {
    return this.timers.has(targetId);
  }

  get running(): boolean {
    return this.isRunning;
  }

  get scheduledCount(): number {
    return this.timers.size;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Run one check unless the previous check of the same target still holds
   * the lease
   */
  fire(targetId: number): void {
    const release = this.lease.tryAcquire(targetId);
    if (!release) {
      checksSkipped.inc({ target_id: String(targetId) });
      logger.warn('Previous check still running, skipping', { targetId });
      return;
    }

    const run: Promise<void> = this.runner
      .checkTarget(targetId)
      .then(
        () => undefined,
        (error: unknown) => {
          logger.error('Unhandled error in check', { targetId, error: errorMessage(error) });
        }
      )
      .finally(() => {
        release();
        this.inFlight.delete(run);
      });

    this.inFlight.add(run);
  }

  /**
   * Run a maintenance job unless the same job is still running
   */
  async runJob(name: MaintenanceJobName, now: Date = new Date()): Promise<void> {
    if (this.runningJobs.has(name)) {
      logger.warn('Maintenance job still running, skipping', { job: name });
      return;
    }

    this.runningJobs.add(name);
    try {
      switch (name) {
        case 'baseline':
          await this.jobs.recomputeBaselines(now);
          break;
        case 'reminders':
          await this.jobs.sendDownReminders(now);
          break;
        case 'retention':
          await this.jobs.purgeExpiredData(now);
          break;
        case 'digest':
          await this.jobs.sendDailyDigest(now);
          break;
      }
      maintenanceRuns.inc({ job: name, status: 'success' });
    } catch (error) {
      maintenanceRuns.inc({ job: name, status: 'error' });
      logger.error('Maintenance job failed', { job: name, error: errorMessage(error) });
    } finally {
      this.runningJobs.delete(name);
    }
  }

  private startMaintenance(): void {
    const { anomaly, reminderSweepMinutes, digestTime } = this.settings;

    if (anomaly.enabled) {
      this.every('baseline', anomaly.computeIntervalMinutes * 60 * 1000);
    }
    this.every('reminders', reminderSweepMinutes * 60 * 1000);
    this.every('retention', DAY_MS);

    const untilDigest = msUntilNextDailyRun(new Date(), digestTime);
    this.maintenanceTimers.push(
      setTimeout(() => {
        void this.runJob('digest');
        this.every('digest', DAY_MS);
      }, untilDigest)
    );

    logger.info('Maintenance timers started', {
      baselineEveryMinutes: anomaly.enabled ? anomaly.computeIntervalMinutes : null,
      reminderEveryMinutes: reminderSweepMinutes,
      digestTime,
      nextDigestInMs: untilDigest,
    });
  }

  private every(name: MaintenanceJobName, intervalMs: number): void {
    this.maintenanceTimers.push(setInterval(() => void this.runJob(name), intervalMs));
  }

  private clearTimer(targetId: number): boolean {
    const entry = this.timers.get(targetId);
    if (!entry) {
      return false;
    }

    if (entry.initial) clearTimeout(entry.initial);
    if (entry.recurring) clearInterval(entry.recurring);
    this.timers.delete(targetId);
    return true;
  }
}

/**
 * Milliseconds from `now` until the next occurrence of a UTC "HH:MM"
 */
export function msUntilNextDailyRun(now: Date, timeOfDay: string): number {
  const [hours, minutes] = timeOfDay.split(':').map((part) => parseInt(part, 10));
  const next = new Date(now.getTime());
  next.setUTCHours(hours, minutes, 0, 0);

  if (next.getTime() <= now.getTime()) {
    next.setTime(next.getTime() + DAY_MS);
  }
  return next.getTime() - now.getTime();
}
