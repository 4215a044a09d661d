import convict from 'convict';

// Add custom URL format
convict.addFormat({
  name: 'url',
  validate: (val: string) => {
    if (val === '') return; // Allow empty string as default
    try {
      new URL(val);
    } catch {
      throw new Error('must be a valid URL');
    }
  },
  coerce: (val: string) => val,
});

convict.addFormat({
  name: 'time-of-day',
  validate: (val: string) => {
    if (!/^([01]\d|2[0-3]):[0-5]\d$/.test(val)) {
      throw new Error('must be a time of day in HH:MM format');
    }
  },
  coerce: (val: string) => val,
});

convict.addFormat({
  name: 'positive-number',
  validate: (val: number) => {
    if (typeof val !== 'number' || !Number.isFinite(val) || val <= 0) {
      throw new Error('must be a positive number');
    }
  },
  coerce: (val: string) => Number(val),
});

export const configSchema = convict({
  server: {
    port: {
      doc: 'HTTP server port',
      format: 'port',
      default: 3000,
      env: 'PORT',
    },
    logLevel: {
      doc: 'Logging level',
      format: ['debug', 'info', 'warn', 'error'],
      default: 'info',
      env: 'LOG_LEVEL',
    },
    apiKey: {
      doc: 'API key required in the X-API-Key header of admin API requests',
      format: String,
      default: '',
      env: 'ADMIN_API_KEY',
      sensitive: true,
    },
  },

  telegram: {
    botToken: {
      doc: 'Telegram bot token used to deliver notifications',
      format: String,
      default: '',
      env: 'BOT_TOKEN',
      sensitive: true,
    },
    adminChatId: {
      doc: 'Chat id that always receives notifications (fallback recipient)',
      format: String,
      default: '',
      env: 'ADMIN_USER_ID',
    },
    apiUrl: {
      doc: 'Telegram Bot API base URL',
      format: 'url',
      default: 'https://api.telegram.org',
      env: 'TELEGRAM_API_URL',
    },
    timeoutMs: {
      doc: 'Timeout for a single Bot API request',
      format: 'nat',
      default: 10000,
      env: 'TELEGRAM_TIMEOUT_MS',
    },
  },

  database: {
    host: {
      doc: 'MS SQL Server host',
      format: String,
      default: 'localhost',
      env: 'DB_HOST',
    },
    port: {
      doc: 'MS SQL Server port',
      format: 'port',
      default: 1433,
      env: 'DB_PORT',
    },
    database: {
      doc: 'Database name',
      format: String,
      default: 'pulsewatch',
      env: 'DB_NAME',
    },
    username: {
      doc: 'Database username',
      format: String,
      default: 'sa',
      env: 'DB_USERNAME',
    },
    password: {
      doc: 'Database password',
      format: String,
      default: '',
      env: 'DB_PASSWORD',
      sensitive: true,
    },
    encrypt: {
      doc: 'Encrypt the database connection',
      format: Boolean,
      default: true,
      env: 'DB_ENCRYPT',
    },
  },

  redis: {
    enabled: {
      doc: 'Cache the latest baseline per target in Redis',
      format: Boolean,
      default: true,
      env: 'REDIS_ENABLED',
    },
    host: {
      doc: 'Redis host',
      format: String,
      default: 'localhost',
      env: 'REDIS_HOST',
    },
    port: {
      doc: 'Redis port',
      format: 'port',
      default: 6379,
      env: 'REDIS_PORT',
    },
    password: {
      doc: 'Redis password',
      format: String,
      default: '',
      env: 'REDIS_PASSWORD',
      sensitive: true,
    },
    baselineTtlSeconds: {
      doc: 'Baseline cache TTL (seconds)',
      format: 'nat',
      default: 86400,
      env: 'REDIS_TTL_BASELINE',
    },
  },

  monitoring: {
    failureThreshold: {
      doc: 'Consecutive failed checks before a target is declared DOWN',
      format: 'nat',
      default: 3,
      env: 'FAILURE_THRESHOLD',
    },
    recoveryThreshold: {
      doc: 'Consecutive successful checks before a DOWN target is declared UP',
      format: 'nat',
      default: 2,
      env: 'RECOVERY_THRESHOLD',
    },
    requestRetries: {
      doc: 'Maximum attempts per check on transient transport errors',
      format: 'nat',
      default: 3,
      env: 'REQUEST_RETRIES',
    },
    requestBackoffSeconds: {
      doc: 'Base backoff between attempts; attempt k waits base * 2^k',
      format: 'positive-number',
      default: 0.5,
      env: 'REQUEST_BACKOFF',
    },
    initialDelaySeconds: {
      doc: 'Delay before the first check of a newly scheduled target',
      format: 'nat',
      default: 2,
      env: 'INITIAL_CHECK_DELAY',
    },
    downtimeReminderMinutes: {
      doc: 'Minutes between reminders for a target that stays DOWN',
      format: 'nat',
      default: 30,
      env: 'DOWNTIME_REMINDER_MINUTES',
    },
    reminderSweepMinutes: {
      doc: 'Interval of the down-reminder sweep',
      format: 'nat',
      default: 5,
      env: 'REMINDER_SWEEP_MINUTES',
    },
    retentionDays: {
      doc: 'Days of check history and anomaly events to keep',
      format: 'nat',
      default: 30,
      env: 'RETENTION_DAYS',
    },
    digestTime: {
      doc: 'UTC time of day (HH:MM) for the daily digest',
      format: 'time-of-day',
      default: '09:00',
      env: 'DIGEST_TIME',
    },
  },

  anomaly: {
    enabled: {
      doc: 'Enable latency anomaly detection',
      format: Boolean,
      default: true,
      env: 'ML_ENABLED',
    },
    window: {
      doc: 'Number of recent successful samples used for a baseline',
      format: 'nat',
      default: 200,
      env: 'ML_WINDOW',
    },
    computeIntervalMinutes: {
      doc: 'Minutes between baseline recomputations',
      format: 'nat',
      default: 15,
      env: 'ML_COMPUTE_INTERVAL_MINUTES',
    },
    cooldownMinutes: {
      doc: 'Minimum minutes between two anomaly alerts of one target',
      format: 'nat',
      default: 30,
      env: 'ANOMALY_COOLDOWN_MINUTES',
    },
    m: {
      doc: 'Samples out of the last n that must exceed the threshold',
      format: 'nat',
      default: 3,
      env: 'ANOMALY_M',
    },
    n: {
      doc: 'Size of the debounce window',
      format: 'nat',
      default: 5,
      env: 'ANOMALY_N',
    },
    sensitivity: {
      doc: 'Multiplier applied to the UCL; below 1 is more sensitive',
      format: 'positive-number',
      default: 1.5,
      env: 'ANOMALY_SENSITIVITY',
    },
    pctFactor: {
      doc: 'Multiplier applied to the recent P95 floor',
      format: 'positive-number',
      default: 1.2,
      env: 'ANOMALY_PCT_FACTOR',
    },
  },
});

export type MonitorConfig = ReturnType<typeof configSchema.getProperties>;
