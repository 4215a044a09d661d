export { DatabaseClient } from './DatabaseClient';
export type { DatabaseConfig, MonitoringStore } from './types';
