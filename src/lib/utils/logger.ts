import winston from 'winston';
import { config } from '../../config';

const { combine, timestamp, json, printf, colorize, errors } = winston.format;

// One line per entry; the child logger context goes in front of the message
const consoleFormat = printf(
  ({ level, message, timestamp, context, service: _service, version: _version, ...metadata }) => {
    const prefix = typeof context === 'string' ? `[${context}] ` : '';
    let msg = `${timestamp} [${level}] ${prefix}${message}`;

    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }

    return msg;
  }
);

const productionFormat = combine(errors({ stack: true }), timestamp(), json());

const developmentFormat = combine(
  errors({ stack: true }),
  colorize(),
  timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  consoleFormat
);

export const logger = winston.createLogger({
  level: config.server.logLevel,
  format: process.env.NODE_ENV === 'production' ? productionFormat : developmentFormat,
  defaultMeta: {
    service: 'pulsewatch',
    version: process.env.APP_VERSION || '1.0.0',
  },
  silent: process.env.NODE_ENV === 'test',
  transports: [new winston.transports.Console()],
});

export type Logger = winston.Logger;

/**
 * Child logger bound to a context such as `target:42`
 */
export function createChildLogger(context: string, metadata: Record<string, unknown> = {}): Logger {
  return logger.child({ context, ...metadata });
}

export default logger;
