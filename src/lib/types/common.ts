/**
 * Common type definitions shared across the service
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH' | 'HEAD';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD'];

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  timestamp: string;
  checks: {
    database: ComponentHealth;
    cache: ComponentHealth;
    messaging: ComponentHealth;
    scheduler: ComponentHealth;
  };
}

export interface ComponentHealth {
  status: 'up' | 'down' | 'disabled';
  latencyMs?: number;
  error?: string;
}

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}
