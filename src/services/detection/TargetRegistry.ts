import { z } from 'zod';
import type { MonitoringStore } from '../../lib/clients/database';
import type { AnomalySettings } from '../../config/settings';
import { NotFoundError, ValidationError } from '../../lib/utils/errors';
import logger from '../../lib/utils/logger';
import { formatZodIssues, schemas, validate } from '../../lib/utils/validation';
import type {
  MonitoredTarget,
  TargetConfigPatch,
  TargetCreateInput,
  TargetFieldUpdate,
} from '../../lib/types/target';
import type { ScheduleListener } from './types';

export const MIN_CHECK_INTERVAL_SECONDS = 10;

const methodSchema = z.enum(['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD']);
const nameSchema = z.string().trim().min(1).max(200);
const expectedStatusSchema = z.number().int().min(100).max(599);
const timeoutSchema = z.number().int().min(1).max(300);
const intervalSchema = z.number().int().min(MIN_CHECK_INTERVAL_SECONDS).max(86400);
const jsonKeysSchema = z
  .string()
  .trim()
  .max(1000)
  .nullable()
  .transform((value) => (value === null || value === '' ? null : value));
const headersSchema = z.record(z.string()).nullable();
const sensitivitySchema = z.number().positive();
const debounceSchema = z.number().int().min(1);

export const targetCreateSchema = z.object({
  name: nameSchema.optional(),
  url: schemas.httpUrl,
  method: methodSchema.default('GET'),
  expectedStatus: expectedStatusSchema.default(200),
  timeoutSeconds: timeoutSchema.default(10),
  checkIntervalSeconds: intervalSchema.default(60),
  jsonKeys: jsonKeysSchema.default(null),
  headers: headersSchema.default(null),
  requestBody: z.unknown().optional(),
  isActive: z.boolean().default(true),
  anomalySensitivity: sensitivitySchema.nullable().default(null),
  anomalyM: debounceSchema.nullable().default(null),
  anomalyN: debounceSchema.nullable().default(null),
  anomalyAlertsEnabled: z.boolean().default(true),
});

export const targetFieldUpdateSchema = z.discriminatedUnion('field', [
  z.object({ field: z.literal('name'), value: nameSchema }),
  z.object({ field: z.literal('url'), value: schemas.httpUrl }),
  z.object({ field: z.literal('method'), value: methodSchema }),
  z.object({ field: z.literal('expectedStatus'), value: expectedStatusSchema }),
  z.object({ field: z.literal('timeoutSeconds'), value: timeoutSchema }),
  z.object({ field: z.literal('checkIntervalSeconds'), value: intervalSchema }),
  z.object({ field: z.literal('jsonKeys'), value: jsonKeysSchema }),
  z.object({ field: z.literal('headers'), value: headersSchema }),
  z.object({ field: z.literal('requestBody'), value: z.unknown() }),
]);

export const anomalyConfigSchema = z
  .object({
    sensitivity: sensitivitySchema.nullable().optional(),
    m: debounceSchema.nullable().optional(),
    n: debounceSchema.nullable().optional(),
    alertsEnabled: z.boolean().optional(),
  })
  .strict();

export type AnomalyConfigInput = z.infer<typeof anomalyConfigSchema>;

/**
 * Owns monitored-target configuration. Every write is validated before it
 * reaches the store, and the scheduler is told about changes that affect
 * timers.
 */
export class TargetRegistry {
  constructor(
    private readonly store: MonitoringStore,
    private readonly defaults: Pick<AnomalySettings, 'm' | 'n'>,
    private readonly scheduler: ScheduleListener | null = null
  ) {}

  async createTarget(input: unknown): Promise<MonitoredTarget> {
    const parsed = validate(targetCreateSchema, input, 'target');
    this.assertDebounce(parsed.anomalyM, parsed.anomalyN);

    const create: TargetCreateInput = {
      ...parsed,
      name: parsed.name ?? new URL(parsed.url).host,
      requestBody: parsed.requestBody ?? null,
    };

    const target = await this.store.createTarget(create);
    logger.info('Target registered', { id: target.id, name: target.name, url: target.url });

    if (target.isActive) {
      this.scheduler?.schedule(target);
    }
    return target;
  }

  async getTarget(id: number): Promise<MonitoredTarget> {
    const target = await this.store.getTarget(id);
    if (!target) {
      throw new NotFoundError('Target', id);
    }
    return target;
  }

  async listTargets(): Promise<MonitoredTarget[]> {
    return this.store.listTargets();
  }

  /**
   * Apply tagged field updates; a later update of the same field wins
   */
  async updateTarget(id: number, updates: readonly unknown[]): Promise<MonitoredTarget> {
    if (updates.length === 0) {
      throw new ValidationError('No field updates given');
    }

    const parsed = updates.map((update) => parseFieldUpdate(update));
    const current = await this.getTarget(id);

    const patch: TargetConfigPatch = {};
    for (const update of parsed) {
      applyFieldUpdate(patch, update);
    }

    const updated = await this.requireUpdated(id, patch);
    logger.info('Target updated', { id, fields: parsed.map((update) => update.field) });

    if (updated.isActive && updated.checkIntervalSeconds !== current.checkIntervalSeconds) {
      this.scheduler?.schedule(updated);
    }
    return updated;
  }

  /**
   * Pause or resume monitoring. Repeating the call leaves the same outcome.
   */
  async setActive(id: number, active: boolean): Promise<MonitoredTarget> {
    const current = await this.getTarget(id);
    const target =
      current.isActive === active ? current : await this.requireUpdated(id, { isActive: active });

    if (active) {
      this.scheduler?.schedule(target);
    } else {
      this.scheduler?.unschedule(id);
    }

    logger.info(active ? 'Target resumed' : 'Target paused', { id });
    return target;
  }

  async mute(id: number, until: Date | null): Promise<MonitoredTarget> {
    await this.getTarget(id);
    return this.requireUpdated(id, { muted: true, mutedUntil: until });
  }

  async unmute(id: number): Promise<MonitoredTarget> {
    await this.getTarget(id);
    return this.requireUpdated(id, { muted: false, mutedUntil: null });
  }

  /**
   * Change per-target anomaly tuning; null restores the global default
   */
  async configureAnomaly(id: number, input: unknown): Promise<MonitoredTarget> {
    const config = validate(anomalyConfigSchema, input, 'anomaly configuration');
    const current = await this.getTarget(id);

    const m = config.m === undefined ? current.anomalyM : config.m;
    const n = config.n === undefined ? current.anomalyN : config.n;
    this.assertDebounce(m, n);

    const patch: TargetConfigPatch = {};
    if (config.sensitivity !== undefined) patch.anomalySensitivity = config.sensitivity;
    if (config.m !== undefined) patch.anomalyM = config.m;
    if (config.n !== undefined) patch.anomalyN = config.n;
    if (config.alertsEnabled !== undefined) patch.anomalyAlertsEnabled = config.alertsEnabled;

    return this.requireUpdated(id, patch);
  }

  async deleteTarget(id: number): Promise<void> {
    this.scheduler?.unschedule(id);

    const deleted = await this.store.deleteTarget(id);
    if (!deleted) {
      throw new NotFoundError('Target', id);
    }
    logger.info('Target deleted', { id });
  }

  /**
   * n >= m >= 1 over the effective values (override or global default)
   */
  private assertDebounce(m: number | null, n: number | null): void {
    const effectiveM = m ?? this.defaults.m;
    const effectiveN = n ?? this.defaults.n;

    if (effectiveM < 1 || effectiveN < effectiveM) {
      throw new ValidationError('Anomaly window must satisfy n >= m >= 1', [
        { field: 'anomalyN', message: `n (${effectiveN}) must be >= m (${effectiveM}) >= 1` },
      ]);
    }
  }

  private async requireUpdated(id: number, patch: TargetConfigPatch): Promise<MonitoredTarget> {
    const updated = await this.store.updateTargetConfig(id, patch);
    if (!updated) {
      throw new NotFoundError('Target', id);
    }
    return updated;
  }
}

/**
 * Validate one tagged field update; unknown fields are rejected
 */
export function parseFieldUpdate(raw: unknown): TargetFieldUpdate {
  const result = targetFieldUpdateSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError('Invalid field update', formatZodIssues(result.error));
  }
  return result.data;
}

function applyFieldUpdate(patch: TargetConfigPatch, update: TargetFieldUpdate): void {
  switch (update.field) {
    case 'name':
      patch.name = update.value;
      break;
    case 'url':
      patch.url = update.value;
      break;
    case 'method':
      patch.method = update.value;
      break;
    case 'expectedStatus':
      patch.expectedStatus = update.value;
      break;
    case 'timeoutSeconds':
      patch.timeoutSeconds = update.value;
      break;
    case 'checkIntervalSeconds':
      patch.checkIntervalSeconds = update.value;
      break;
    case 'jsonKeys':
      patch.jsonKeys = update.value;
      break;
    case 'headers':
      patch.headers = update.value;
      break;
    case 'requestBody':
      patch.requestBody = update.value ?? null;
      break;
  }
}
