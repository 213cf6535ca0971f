import Joi from 'joi';

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type RetryPosition = 'head' | 'tail';

export interface OpsQueueConfig {
  // Server configuration
  server: {
    host: string;
    port: number;
    mode: 'mcp' | 'http';
  };

  // Storage configuration
  storage: {
    provider: 'memory' | 'file';
    fileStorage: {
      dataDir: string;
      lockTimeout: number;
    };
  };

  // Logging configuration
  logging: {
    level: LogLevelName;
    pretty: boolean;
    correlation: boolean;
  };

  // Worker pool and retry policy
  queue: {
    concurrency: number;
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    attemptTimeoutMs: number;
    retryPosition: RetryPosition;
    shutdownDrainMs: number;
  };

  // Finished task eviction
  retention: {
    retentionMinutes: number;
    reaperIntervalMinutes: number;
  };

  executors: {
    docker: {
      binary: string;
    };
  };

  http: {
    corsOrigin: string;
    rateLimitWindowMs: number;
    rateLimitMax: number;
  };
}

export const configSchema = Joi.object<OpsQueueConfig>({
  server: Joi.object({
    host: Joi.string().default('localhost'),
    port: Joi.number().port().default(3000),
    mode: Joi.string().valid('mcp', 'http').default('mcp'),
  }).default(),

  storage: Joi.object({
    provider: Joi.string().valid('memory', 'file').default('file'),
    fileStorage: Joi.object({
      dataDir: Joi.string().default('./data'),
      lockTimeout: Joi.number().min(1000).default(30000), // 30 seconds
    }).default(),
  }).default(),

  logging: Joi.object({
    level: Joi.string().valid('error', 'warn', 'info', 'debug', 'trace').default('info'),
    pretty: Joi.boolean().default(process.env.NODE_ENV !== 'production'),
    correlation: Joi.boolean().default(true),
  }).default(),

  queue: Joi.object({
    concurrency: Joi.number().integer().min(1).max(64).default(2),
    maxAttempts: Joi.number().integer().min(1).max(20).default(3),
    baseDelayMs: Joi.number().integer().min(0).default(1000),
    maxDelayMs: Joi.number().integer().min(0).default(60000),
    attemptTimeoutMs: Joi.number().integer().min(1).default(30 * 60 * 1000), // 30 minutes
    retryPosition: Joi.string().valid('head', 'tail').default('head'),
    shutdownDrainMs: Joi.number().integer().min(0).default(10000),
  }).default(),

  retention: Joi.object({
    retentionMinutes: Joi.number().min(1).default(1440), // 24 hours
    reaperIntervalMinutes: Joi.number().min(0.01).default(5),
  }).default(),

  executors: Joi.object({
    docker: Joi.object({
      binary: Joi.string().default('docker'),
    }).default(),
  }).default(),

  http: Joi.object({
    corsOrigin: Joi.string().default('*'),
    rateLimitWindowMs: Joi.number().integer().min(1000).default(15 * 60 * 1000),
    rateLimitMax: Joi.number().integer().min(1).default(1000),
  }).default(),
}).default();
