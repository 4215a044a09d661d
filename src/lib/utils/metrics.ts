import { Counter, Histogram, Gauge, Registry } from 'prom-client';

export const register = new Registry();

// Checks performed, labelled by outcome
export const checksTotal = new Counter({
  name: 'pulsewatch_checks_total',
  help: 'Total checks performed',
  labelNames: ['target_id', 'outcome'], // outcome: success, failure
  registers: [register],
});

// Checks skipped because the previous check of the same target was still running
export const checksSkipped = new Counter({
  name: 'pulsewatch_checks_skipped_total',
  help: 'Scheduled checks skipped because the previous one was still in flight',
  labelNames: ['target_id'],
  registers: [register],
});

export const responseTime = new Histogram({
  name: 'pulsewatch_response_time_ms',
  help: 'Target response time in milliseconds',
  labelNames: ['target_id'],
  buckets: [25, 50, 75, 100, 150, 200, 300, 500, 700, 1000, 1500, 2000, 3000, 5000, 10000],
  registers: [register],
});

export const incidentsStarted = new Counter({
  name: 'pulsewatch_incidents_total',
  help: 'Incidents started (UP to DOWN transitions)',
  labelNames: ['target_id'],
  registers: [register],
});

export const anomaliesDetected = new Counter({
  name: 'pulsewatch_anomalies_total',
  help: 'Latency anomalies recorded',
  labelNames: ['target_id'],
  registers: [register],
});

export const targetsDown = new Gauge({
  name: 'pulsewatch_targets_down',
  help: 'Number of monitored targets currently DOWN',
  registers: [register],
});

// Baseline gauges (per target)
export const baselineMedian = new Gauge({
  name: 'pulsewatch_baseline_median_ms',
  help: 'Baseline median response time (ms)',
  labelNames: ['target_id'],
  registers: [register],
});

export const baselineMad = new Gauge({
  name: 'pulsewatch_baseline_mad_ms',
  help: 'Baseline median absolute deviation (ms)',
  labelNames: ['target_id'],
  registers: [register],
});

export const baselineUcl = new Gauge({
  name: 'pulsewatch_baseline_ucl_ms',
  help: 'Baseline upper control limit (ms)',
  labelNames: ['target_id'],
  registers: [register],
});

export const baselineP95 = new Gauge({
  name: 'pulsewatch_baseline_p95_ms',
  help: 'Baseline P95 response time (ms)',
  labelNames: ['target_id'],
  registers: [register],
});

export const notificationsSent = new Counter({
  name: 'pulsewatch_notifications_total',
  help: 'Notification deliveries by kind and result',
  labelNames: ['kind', 'result'], // result: delivered, failed
  registers: [register],
});

export const maintenanceRuns = new Counter({
  name: 'pulsewatch_maintenance_runs_total',
  help: 'Maintenance job runs',
  labelNames: ['job', 'status'],
  registers: [register],
});

export const externalApiCalls = new Counter({
  name: 'pulsewatch_external_api_calls_total',
  help: 'Total external API calls',
  labelNames: ['service', 'status'],
  registers: [register],
});

export const externalApiDuration = new Histogram({
  name: 'pulsewatch_external_api_duration_seconds',
  help: 'Duration of external API calls',
  labelNames: ['service', 'endpoint'],
  buckets: [0.1, 0.5, 1, 2, 5, 10],
  registers: [register],
});

export const apiRequestDuration = new Histogram({
  name: 'pulsewatch_api_request_duration_seconds',
  help: 'Admin API request duration',
  labelNames: ['method', 'route', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const circuitBreakerState = new Gauge({
  name: 'pulsewatch_circuit_breaker_state',
  help: 'Circuit breaker state (0=closed, 1=half-open, 2=open)',
  labelNames: ['service'],
  registers: [register],
});

export const cacheHits = new Counter({
  name: 'pulsewatch_cache_hits_total',
  help: 'Total cache hits',
  labelNames: ['cache_type'],
  registers: [register],
});

export const cacheMisses = new Counter({
  name: 'pulsewatch_cache_misses_total',
  help: 'Total cache misses',
  labelNames: ['cache_type'],
  registers: [register],
});

export function updateCircuitBreakerState(service: string, state: 'closed' | 'open' | 'half-open') {
  const stateValue = state === 'closed' ? 0 : state === 'half-open' ? 1 : 2;
  circuitBreakerState.set({ service }, stateValue);
}
