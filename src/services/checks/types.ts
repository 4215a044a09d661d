import type { AxiosInstance } from 'axios';
import type { MonitoringSettings } from '../../config/settings';

/**
 * The part of an axios instance the executor needs
 */
export type HttpRequester = Pick<AxiosInstance, 'request'>;

export type CheckExecutorSettings = Pick<MonitoringSettings, 'requestRetries' | 'requestBackoffSeconds'>;

export interface ProbeResponse {
  status: number;
  body: string;
  latencyMs: number;
}
