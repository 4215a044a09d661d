import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

import { config } from './config';
import { logger } from './lib/utils/logger';
import { startServer } from './server';

async function bootstrap(): Promise<void> {
  try {
    logger.info('Starting pulsewatch', {
      version: process.env.APP_VERSION || '1.0.0',
      nodeVersion: process.version,
      environment: process.env.NODE_ENV || 'development',
    });

    await startServer();

    logger.info('Monitoring started', {
      port: config.server.port,
    });
  } catch (error) {
    logger.error('Failed to start', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
}

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', { reason });
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', {
    error: error.message,
    stack: error.stack,
  });
  process.exit(1);
});

void bootstrap();
