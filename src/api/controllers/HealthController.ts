import { Request, Response } from 'express';
import type { MonitoringStore } from '../../lib/clients/database';
import { errorMessage } from '../../lib/utils/errors';
import logger from '../../lib/utils/logger';
import type { HealthStatus, ComponentHealth } from '../../lib/types/common';

export interface CacheProbe {
  ping(): Promise<string>;
}

export interface MessagingProbe {
  isConfigured(): boolean;
  getCircuitState(): string;
}

export interface SchedulerProbe {
  readonly running: boolean;
}

export interface HealthDependencies {
  store: Pick<MonitoringStore, 'ping'>;
  cache: CacheProbe | null;
  messaging: MessagingProbe;
  scheduler: SchedulerProbe;
}

/**
 * Health check API controller
 */
export class HealthController {
  private readonly version: string;

  constructor(private readonly deps: HealthDependencies) {
    this.version = process.env.APP_VERSION || '1.0.0';
  }

  /**
   * Basic health check (fast, no dependencies)
   */
  async liveness(_req: Request, res: Response): Promise<void> {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Detailed health check (checks all dependencies)
   */
  async readiness(_req: Request, res: Response): Promise<void> {
    try {
      const checks = await this.runHealthChecks();
      const overallStatus = this.determineOverallStatus(checks);

      const response: HealthStatus = {
        status: overallStatus,
        version: this.version,
        timestamp: new Date().toISOString(),
        checks,
      };

      res.status(overallStatus === 'unhealthy' ? 503 : 200).json(response);
    } catch (error) {
      logger.error('Health check failed', { error: errorMessage(error) });

      res.status(503).json({
        status: 'unhealthy',
        version: this.version,
        timestamp: new Date().toISOString(),
        error: 'Health check failed',
      });
    }
  }

  private async runHealthChecks(): Promise<HealthStatus['checks']> {
    const [database, cache] = await Promise.all([this.checkDatabase(), this.checkCache()]);

    return {
      database,
      cache,
      messaging: this.checkMessaging(),
      scheduler: this.deps.scheduler.running ? { status: 'up' } : { status: 'down', error: 'Scheduler is stopped' },
    };
  }

  private async checkDatabase(): Promise<ComponentHealth> {
    const startTime = Date.now();

    try {
      await this.deps.store.ping();
      return { status: 'up', latencyMs: Date.now() - startTime };
    } catch (error) {
      return { status: 'down', latencyMs: Date.now() - startTime, error: errorMessage(error) };
    }
  }

  private async checkCache(): Promise<ComponentHealth> {
    if (!this.deps.cache) {
      return { status: 'disabled' };
    }

    const startTime = Date.now();
    try {
      const pong = await this.deps.cache.ping();
      if (pong === 'PONG') {
        return { status: 'up', latencyMs: Date.now() - startTime };
      }
      return { status: 'down', latencyMs: Date.now() - startTime, error: 'Unexpected ping response' };
    } catch (error) {
      return { status: 'down', latencyMs: Date.now() - startTime, error: errorMessage(error) };
    }
  }

  private checkMessaging(): ComponentHealth {
    if (!this.deps.messaging.isConfigured()) {
      return { status: 'disabled', error: 'Bot token is not configured' };
    }
    if (this.deps.messaging.getCircuitState() === 'open') {
      return { status: 'down', error: 'Circuit breaker is open' };
    }
    return { status: 'up' };
  }

  /**
   * Database and scheduler are critical; cache and messaging only degrade
   */
  private determineOverallStatus(checks: HealthStatus['checks']): HealthStatus['status'] {
    if ([checks.database, checks.scheduler].some((c) => c.status === 'down')) {
      return 'unhealthy';
    }
    if ([checks.cache, checks.messaging].some((c) => c.status !== 'up')) {
      return 'degraded';
    }
    return 'healthy';
  }
}
