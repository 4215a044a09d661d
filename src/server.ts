import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { config, buildMonitoringSettings } from './config';
import { logger } from './lib/utils/logger';
import { errorMessage } from './lib/utils/errors';
import { register as metricsRegister } from './lib/utils/metrics';
import { DatabaseClient, MonitoringStore } from './lib/clients/database';
import { RedisClient } from './lib/clients/redis';
import { TelegramClient } from './lib/clients/telegram';
import { CheckExecutor } from './services/checks';
import { NotificationService } from './services/notification';
import {
  AnomalyDetector,
  BaselineCalculator,
  BaselineProvider,
  DetectionService,
  IncidentTracker,
  TargetRegistry,
} from './services/detection';
import { MaintenanceService } from './services/maintenance';
import { MonitorScheduler } from './services/scheduler';
import { createApiRouter } from './api/routes';
import { createHealthRouter } from './api/routes/health';
import type { HealthDependencies } from './api/controllers/HealthController';
import { authenticateApiKey, errorHandler, notFoundHandler, requestLogger } from './api/middleware';

export interface AppDependencies {
  store: MonitoringStore;
  registry: TargetRegistry;
  baselines: BaselineProvider;
  health: HealthDependencies;
  apiKey: string;
  rateLimitPerMinute?: number;
}

/**
 * Build the HTTP app without binding a port
 */
export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  // Request logging
  app.use(requestLogger);

  // Rate limiting for API routes
  const apiLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: deps.rateLimitPerMinute ?? 100,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: {
        code: 'RATE_LIMIT_EXCEEDED',
        message: 'Too many requests, please try again later',
      },
    },
  });

  // Public endpoints (no auth required)
  app.use('/health', createHealthRouter(deps.health));

  app.get('/metrics', async (_req, res) => {
    res.set('Content-Type', metricsRegister.contentType);
    res.end(await metricsRegister.metrics());
  });

  // Admin API (protected with API key auth)
  const apiRouter = createApiRouter({
    store: deps.store,
    registry: deps.registry,
    baselines: deps.baselines,
  });

  app.use('/api/v1', apiLimiter, authenticateApiKey(deps.apiKey), apiRouter);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * Connect a Redis cache, or run without one when it is unavailable
 */
async function connectCache(): Promise<RedisClient | null> {
  if (!config.redis.enabled) {
    logger.info('Baseline cache disabled');
    return null;
  }

  const redis = new RedisClient({
    host: config.redis.host,
    port: config.redis.port,
    password: config.redis.password,
  });

  try {
    await redis.connect();
    return redis;
  } catch (error) {
    logger.warn('Redis unavailable, continuing without baseline cache', { error: errorMessage(error) });
    await redis.disconnect().catch((disconnectError: unknown) => {
      logger.debug('Redis disconnect after failed connect', { error: errorMessage(disconnectError) });
    });
    return null;
  }
}

export async function startServer(): Promise<void> {
  const settings = buildMonitoringSettings(config);

  // Initialize database
  const database = new DatabaseClient(config.database);
  await database.connect();

  const redis = await connectCache();

  const telegram = new TelegramClient({
    botToken: config.telegram.botToken,
    apiUrl: config.telegram.apiUrl,
    timeoutMs: config.telegram.timeoutMs,
  });
  if (!telegram.isConfigured()) {
    logger.warn('Bot token is not configured; notifications will fail until it is set');
  }

  const notifier = new NotificationService(database, telegram, {
    adminChatId: config.telegram.adminChatId,
  });

  // Monitoring core
  const executor = new CheckExecutor(settings);
  const tracker = new IncidentTracker(database, notifier, settings);
  const baselines = new BaselineCalculator(
    database,
    settings.anomaly,
    redis,
    config.redis.baselineTtlSeconds
  );
  const detector = new AnomalyDetector(database, baselines, notifier, settings.anomaly);
  const detection = new DetectionService(database, executor, tracker, detector);
  const maintenance = new MaintenanceService(database, notifier, baselines, settings);
  const scheduler = new MonitorScheduler(database, detection, maintenance, settings);
  const registry = new TargetRegistry(database, settings.anomaly, scheduler);

  await detection.refreshDownGauge();
  await scheduler.start();

  const app = createApp({
    store: database,
    registry,
    baselines,
    apiKey: config.server.apiKey,
    health: { store: database, cache: redis, messaging: telegram, scheduler },
  });

  if (!config.server.apiKey) {
    logger.warn('ADMIN_API_KEY is not set; the admin API rejects every request');
  }

  // Graceful shutdown
  process.on('SIGTERM', () => {
    logger.info('SIGTERM received, shutting down gracefully');
    const shutdown = async (): Promise<void> => {
      await scheduler.stop();
      await database.disconnect();
      await redis?.disconnect();
    };

    shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
  });

  // Start server
  return new Promise<void>((resolve, reject) => {
    const server = app.listen(config.server.port, () => {
      logger.info(`Server listening on port ${config.server.port}`);
      resolve();
    });

    server.on('error', reject);
  });
}
