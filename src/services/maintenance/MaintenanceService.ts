import type { MonitoringStore } from '../../lib/clients/database';
import type { MonitoringSettings } from '../../config/settings';
import { errorMessage } from '../../lib/utils/errors';
import logger from '../../lib/utils/logger';
import type { RetentionResult } from '../../lib/types/monitoring';
import { isTargetMuted } from '../../lib/types/target';
import type { RecomputeSummary } from '../detection/BaselineCalculator';
import type { DigestEntry, Notifier } from '../notification/types';
import type { MaintenanceJobs } from '../scheduler/types';

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export interface BaselineJob {
  recomputeAll(now: Date): Promise<RecomputeSummary>;
}

export type MaintenanceSettings = Pick<MonitoringSettings, 'downtimeReminderMinutes' | 'retentionDays'>;

/**
 * Down reminders, retention purge, daily digest and baseline refresh.
 * Per-target failures are logged and the sweep moves on.
 */
export class MaintenanceService implements MaintenanceJobs {
  constructor(
    private readonly store: MonitoringStore,
    private readonly notifier: Notifier,
    private readonly baselines: BaselineJob,
    private readonly settings: MaintenanceSettings
  ) {}

  async recomputeBaselines(now: Date): Promise<RecomputeSummary> {
    return this.baselines.recomputeAll(now);
  }

  /**
   * Remind subscribers about targets that stay DOWN. Returns the number of
   * reminders sent.
   */
  async sendDownReminders(now: Date): Promise<number> {
    const targets = await this.store.listActiveTargets();
    const intervalMs = this.settings.downtimeReminderMinutes * MINUTE_MS;
    let sent = 0;

    for (const target of targets) {
      if (target.isUp || isTargetMuted(target, now)) {
        continue;
      }

      try {
        const lastReminder = await this.store.getLastReminderTime(target.id);
        // A reminder sent before this incident started belongs to an earlier one
        const remindedThisIncident =
          lastReminder !== null &&
          (target.incidentStartTime === null || lastReminder.getTime() >= target.incidentStartTime.getTime());
        if (lastReminder && remindedThisIncident && now.getTime() - lastReminder.getTime() < intervalMs) {
          continue;
        }

        await this.notifier.dispatch({
          kind: 'reminder',
          target,
          incidentStart: target.incidentStartTime ?? now,
          now,
        });
        await this.store.setLastReminderTime(target.id, now);
        sent++;
      } catch (error) {
        logger.error('Failed to send down reminder', { targetId: target.id, error: errorMessage(error) });
      }
    }

    if (sent > 0) {
      logger.info('Down reminders sent', { count: sent });
    }
    return sent;
  }

  /**
   * Drop history and anomaly rows past retention. Open incidents and the
   * latest baseline of each target are kept by the store.
   */
  async purgeExpiredData(now: Date): Promise<RetentionResult> {
    const cutoff = new Date(now.getTime() - this.settings.retentionDays * DAY_MS);
    const result = await this.store.purgeBefore(cutoff);

    logger.info('Retention purge completed', { cutoff: cutoff.toISOString(), ...result });
    return result;
  }

  /**
   * Send the 24h summary of every active target. Returns the number of
   * targets reported.
   */
  async sendDailyDigest(now: Date): Promise<number> {
    const targets = await this.store.listActiveTargets();
    if (targets.length === 0) {
      logger.info('No active targets for daily digest');
      return 0;
    }

    const since = new Date(now.getTime() - DAY_MS);
    const entries: DigestEntry[] = [];

    for (const target of targets) {
      try {
        const stats = await this.store.getStatsForPeriod(target.id, since, now);
        entries.push({ target: { id: target.id, name: target.name, isUp: target.isUp }, stats });
      } catch (error) {
        logger.error('Failed to load digest stats', { targetId: target.id, error: errorMessage(error) });
      }
    }

    await this.notifier.dispatch({ kind: 'digest', generatedAt: now, entries });
    logger.info('Daily digest sent', { targets: entries.length });
    return entries.length;
  }
}
