export { MonitorScheduler, msUntilNextDailyRun } from './MonitorScheduler';
export { CheckLease } from './CheckLease';
export type { CheckRunner, MaintenanceJobs, MaintenanceJobName } from './types';
