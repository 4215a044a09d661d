export { MaintenanceService } from './MaintenanceService';
export type { BaselineJob, MaintenanceSettings } from './MaintenanceService';
