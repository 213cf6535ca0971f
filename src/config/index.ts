import { OpsQueueConfig, configSchema } from './types.js';

type Env = Record<string, string | undefined>;

function int(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function bool(value: string | undefined): boolean | undefined {
  return value === undefined ? undefined : value.toLowerCase() === 'true';
}

/**
 * Load configuration from environment variables
 * Following 12-factor app methodology
 */
export function loadConfig(env: Env = process.env): OpsQueueConfig {
  const envConfig = {
    server: {
      host: env.OPSQUEUE_HOST,
      port: int(env.OPSQUEUE_PORT),
      mode: env.OPSQUEUE_MODE,
    },
    storage: {
      provider: env.OPSQUEUE_STORAGE_PROVIDER,
      fileStorage: {
        dataDir: env.OPSQUEUE_FILE_DATA_DIR,
        lockTimeout: int(env.OPSQUEUE_FILE_LOCK_TIMEOUT),
      },
    },
    logging: {
      level: env.OPSQUEUE_LOG_LEVEL,
      pretty: bool(env.OPSQUEUE_LOG_PRETTY),
      correlation: env.OPSQUEUE_LOG_CORRELATION === undefined
        ? undefined
        : env.OPSQUEUE_LOG_CORRELATION.toLowerCase() !== 'false',
    },
    queue: {
      concurrency: int(env.OPSQUEUE_CONCURRENCY),
      maxAttempts: int(env.OPSQUEUE_MAX_ATTEMPTS),
      baseDelayMs: int(env.OPSQUEUE_RETRY_BASE_DELAY_MS),
      maxDelayMs: int(env.OPSQUEUE_RETRY_MAX_DELAY_MS),
      attemptTimeoutMs: int(env.OPSQUEUE_ATTEMPT_TIMEOUT_MS),
      retryPosition: env.OPSQUEUE_RETRY_POSITION,
      shutdownDrainMs: int(env.OPSQUEUE_SHUTDOWN_DRAIN_MS),
    },
    retention: {
      retentionMinutes: int(env.OPSQUEUE_RETENTION_MINUTES),
      reaperIntervalMinutes: env.OPSQUEUE_REAPER_INTERVAL
        ? parseFloat(env.OPSQUEUE_REAPER_INTERVAL)
        : undefined,
    },
    executors: {
      docker: {
        binary: env.OPSQUEUE_DOCKER_BINARY,
      },
    },
    http: {
      corsOrigin: env.OPSQUEUE_CORS_ORIGIN,
      rateLimitWindowMs: int(env.OPSQUEUE_RATE_LIMIT_WINDOW_MS),
      rateLimitMax: int(env.OPSQUEUE_RATE_LIMIT_MAX),
    },
  };

  // Remove undefined values to let Joi apply defaults
  const cleanConfig = removeUndefined(envConfig);

  // Validate and apply defaults
  const { error, value } = configSchema.validate(cleanConfig, {
    allowUnknown: false,
    stripUnknown: true,
  });

  if (error) {
    throw new Error(`Configuration validation failed: ${error.message}`);
  }

  return value;
}

/**
 * Recursively remove undefined values from an object
 */
function removeUndefined(obj: unknown): unknown {
  if (obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(removeUndefined);
  }

  const cleaned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) {
      cleaned[key] = removeUndefined(value);
    }
  }
  return cleaned;
}

export * from './types.js';
