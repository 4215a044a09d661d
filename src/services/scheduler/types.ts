export interface CheckRunner {
  checkTarget(targetId: number): Promise<unknown>;
}

/**
 * Periodic jobs driven by the scheduler's maintenance timers
 */
export interface MaintenanceJobs {
  recomputeBaselines(now: Date): Promise<unknown>;
  sendDownReminders(now: Date): Promise<unknown>;
  purgeExpiredData(now: Date): Promise<unknown>;
  sendDailyDigest(now: Date): Promise<unknown>;
}

export type MaintenanceJobName = 'baseline' | 'reminders' | 'retention' | 'digest';
