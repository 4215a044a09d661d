import type { Incident } from '../types/monitoring';

const UNIT_MS: Record<string, number> = {
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

/**
 * Parse a period such as "30m", "24h" or "7d" into milliseconds.
 * Returns null for anything else.
 */
export function parsePeriod(period: string): number | null {
  const match = period.trim().toLowerCase().match(/^(\d+)([mhd])$/);
  if (!match) {
    return null;
  }

  const value = parseInt(match[1], 10);
  if (value <= 0) {
    return null;
  }
  return value * UNIT_MS[match[2]];
}

export interface DowntimeSummary {
  incidentCount: number;
  totalDowntimeMs: number;
  avgDowntimeMs: number;
}

/**
 * Sum incident durations; open incidents count up to `now`
 */
export function summarizeDowntime(
  incidents: Pick<Incident, 'startTime' | 'endTime'>[],
  now: Date
): DowntimeSummary {
  let totalDowntimeMs = 0;

  for (const incident of incidents) {
    const end = incident.endTime ?? now;
    totalDowntimeMs += Math.max(0, end.getTime() - incident.startTime.getTime());
  }

  return {
    incidentCount: incidents.length,
    totalDowntimeMs,
    avgDowntimeMs: incidents.length > 0 ? totalDowntimeMs / incidents.length : 0,
  };
}

/**
 * Uptime percentage; a period without checks counts as fully up
 */
export function uptimePercent(okChecks: number, totalChecks: number): number {
  return totalChecks > 0 ? (okChecks / totalChecks) * 100 : 100;
}
