import { Request, Response } from 'express';
import { z } from 'zod';
import type { MonitoringStore } from '../../lib/clients/database';
import { NotFoundError } from '../../lib/utils/errors';
import { validate } from '../../lib/utils/validation';
import type { BaselineProvider, TargetRegistry } from '../../services/detection';
import { idParam, periodStart } from './params';

const updateBodySchema = z.object({
  updates: z.array(z.unknown()).min(1),
});

const muteBodySchema = z
  .object({
    until: z.string().datetime({ offset: true }).nullable().optional(),
    minutes: z.number().int().positive().optional(),
  })
  .refine((body) => body.until === undefined || body.minutes === undefined, {
    message: 'Give either until or minutes, not both',
  });

/**
 * Monitored targets API controller
 */
export class TargetsController {
  constructor(
    private readonly registry: TargetRegistry,
    private readonly store: Pick<MonitoringStore, 'getStatsForPeriod' | 'listIncidents'>,
    private readonly baselines: BaselineProvider
  ) {}

  async list(_req: Request, res: Response): Promise<void> {
    const targets = await this.registry.listTargets();
    res.json({ data: targets });
  }

  async create(req: Request, res: Response): Promise<void> {
    const target = await this.registry.createTarget(req.body);
    res.status(201).json(target);
  }

  async get(req: Request, res: Response): Promise<void> {
    const target = await this.registry.getTarget(idParam(req));
    res.json(target);
  }

  /**
   * PATCH with a list of tagged field updates
   */
  async update(req: Request, res: Response): Promise<void> {
    const { updates } = validate(updateBodySchema, req.body, 'update request');
    const target = await this.registry.updateTarget(idParam(req), updates);
    res.json(target);
  }

  async remove(req: Request, res: Response): Promise<void> {
    await this.registry.deleteTarget(idParam(req));
    res.status(204).end();
  }

  async pause(req: Request, res: Response): Promise<void> {
    res.json(await this.registry.setActive(idParam(req), false));
  }

  async resume(req: Request, res: Response): Promise<void> {
    res.json(await this.registry.setActive(idParam(req), true));
  }

  /**
   * Mute until a timestamp, for a number of minutes, or indefinitely
   */
  async mute(req: Request, res: Response): Promise<void> {
    const body = validate(muteBodySchema, req.body ?? {}, 'mute request');

    let until: Date | null = null;
    if (body.minutes !== undefined) {
      until = new Date(Date.now() + body.minutes * 60 * 1000);
    } else if (body.until) {
      until = new Date(body.until);
    }

    res.json(await this.registry.mute(idParam(req), until));
  }

  async unmute(req: Request, res: Response): Promise<void> {
    res.json(await this.registry.unmute(idParam(req)));
  }

  async configureAnomaly(req: Request, res: Response): Promise<void> {
    res.json(await this.registry.configureAnomaly(idParam(req), req.body));
  }

  async stats(req: Request, res: Response): Promise<void> {
    const id = idParam(req);
    await this.registry.getTarget(id);

    const now = new Date();
    const { period, since } = periodStart(req, '24h', now);
    const stats = await this.store.getStatsForPeriod(id, since, now);

    res.json({ targetId: id, period, ...stats });
  }

  async incidents(req: Request, res: Response): Promise<void> {
    const id = idParam(req);
    await this.registry.getTarget(id);

    const { period, since } = periodStart(req, '7d', new Date());
    const incidents = await this.store.listIncidents(id, since);

    res.json({ targetId: id, period, data: incidents });
  }

  async baseline(req: Request, res: Response): Promise<void> {
    const id = idParam(req);
    await this.registry.getTarget(id);

    const baseline = await this.baselines.getLatestBaseline(id);
    if (!baseline) {
      throw new NotFoundError('Baseline for target', id);
    }
    res.json(baseline);
  }
}
