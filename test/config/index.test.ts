import { describe, it, expect } from 'vitest';
import { loadConfig, configSchema } from '../../src/config/index.js';

describe('Configuration', () => {
  describe('loadConfig', () => {
    it('should load configuration with sensible defaults', () => {
      const config = loadConfig({});

      expect(config.server.host).toBe('localhost');
      expect(config.server.mode).toBe('mcp');
      expect(config.storage.provider).toBe('file');
      expect(config.storage.fileStorage.dataDir).toBe('./data');
      expect(config.logging.level).toBe('info');
      expect(config.logging.correlation).toBe(true);

      expect(config.queue.concurrency).toBe(2);
      expect(config.queue.maxAttempts).toBe(3);
      expect(config.queue.baseDelayMs).toBe(1000);
      expect(config.queue.maxDelayMs).toBe(60000);
      expect(config.queue.retryPosition).toBe('head');
      expect(config.retention.retentionMinutes).toBe(1440);
      expect(config.executors.docker.binary).toBe('docker');
    });

    it('should load configuration from environment variables', () => {
      const config = loadConfig({
        OPSQUEUE_HOST: '0.0.0.0',
        OPSQUEUE_PORT: '8080',
        OPSQUEUE_MODE: 'http',
        OPSQUEUE_STORAGE_PROVIDER: 'memory',
        OPSQUEUE_LOG_LEVEL: 'debug',
        OPSQUEUE_CONCURRENCY: '4',
        OPSQUEUE_MAX_ATTEMPTS: '5',
        OPSQUEUE_RETRY_BASE_DELAY_MS: '250',
        OPSQUEUE_RETRY_MAX_DELAY_MS: '4000',
        OPSQUEUE_ATTEMPT_TIMEOUT_MS: '120000',
        OPSQUEUE_RETRY_POSITION: 'tail',
        OPSQUEUE_DOCKER_BINARY: '/usr/local/bin/podman',
      });

      expect(config.server.host).toBe('0.0.0.0');
      expect(config.server.port).toBe(8080);
      expect(config.server.mode).toBe('http');
      expect(config.storage.provider).toBe('memory');
      expect(config.logging.level).toBe('debug');
      expect(config.queue).toEqual({
        concurrency: 4,
        maxAttempts: 5,
        baseDelayMs: 250,
        maxDelayMs: 4000,
        attemptTimeoutMs: 120000,
        retryPosition: 'tail',
        shutdownDrainMs: 10000,
      });
      expect(config.executors.docker.binary).toBe('/usr/local/bin/podman');
    });

    it('should handle file storage data directory', () => {
      const config = loadConfig({
        OPSQUEUE_STORAGE_PROVIDER: 'file',
        OPSQUEUE_FILE_DATA_DIR: '/custom/data/path',
        OPSQUEUE_FILE_LOCK_TIMEOUT: '5000',
      });

      expect(config.storage.fileStorage).toEqual({ dataDir: '/custom/data/path', lockTimeout: 5000 });
    });

    it('should handle boolean values with different cases', () => {
      const config = loadConfig({
        OPSQUEUE_LOG_PRETTY: 'TRUE',
        OPSQUEUE_LOG_CORRELATION: 'False',
      });

      expect(config.logging.pretty).toBe(true);
      expect(config.logging.correlation).toBe(false);
    });

    it('should parse a fractional reaper interval', () => {
      const config = loadConfig({ OPSQUEUE_REAPER_INTERVAL: '0.5' });
      expect(config.retention.reaperIntervalMinutes).toBe(0.5);
    });

    it('should fail fast on invalid values', () => {
      expect(() => loadConfig({ OPSQUEUE_CONCURRENCY: '0' })).toThrow('Configuration validation failed');
      expect(() => loadConfig({ OPSQUEUE_RETRY_POSITION: 'middle' })).toThrow('Configuration validation failed');
      expect(() => loadConfig({ OPSQUEUE_STORAGE_PROVIDER: 'mongodb' })).toThrow('Configuration validation failed');
    });
  });

  describe('configSchema', () => {
    it('should validate valid configuration', () => {
      const { error } = configSchema.validate({
        server: { host: 'localhost', port: 3000, mode: 'mcp' },
        storage: { provider: 'file', fileStorage: { dataDir: './data' } },
        logging: { level: 'info', pretty: true },
        queue: { concurrency: 1, maxAttempts: 1 },
      });
      expect(error).toBeUndefined();
    });

    it('should reject invalid log level', () => {
      const { error } = configSchema.validate({ logging: { level: 'verbose' } });
      expect(error).toBeDefined();
    });

    it('should reject invalid port numbers', () => {
      const { error } = configSchema.validate({ server: { port: 70000 } });
      expect(error).toBeDefined();
    });

    it('should reject a zero attempt budget', () => {
      const { error } = configSchema.validate({ queue: { maxAttempts: 0 } });
      expect(error).toBeDefined();
    });
  });
});
