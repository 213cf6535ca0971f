#!/usr/bin/env node

/**
 * Runs the queue as an HTTP REST API server
 */

import { loadConfig } from './config/index.js';
import { OpsQueueHttpServer } from './server.js';
import { logger } from './utils/logger.js';

export async function runHttpServer(): Promise<void> {
  const config = loadConfig();
  config.server.mode = 'http';
  logger.setLogLevel(config.logging.level);

  logger.info('Starting HTTP server', {
    host: config.server.host,
    port: config.server.port,
    storage: config.storage.provider,
    concurrency: config.queue.concurrency,
  });

  const server = new OpsQueueHttpServer(config);

  const shutdown = async (signal: string) => {
    logger.info('Shutting down HTTP server', { signal });
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', {}, error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.start();

  console.log(`API available at: http://${config.server.host}:${config.server.port}/api`);
  console.log('');
  console.log('API Endpoints:');
  console.log('   POST   /api/tasks              - Submit a task {kind, key?, params}');
  console.log('   POST   /api/push               - Queue a docker push {imageName, tag?}');
  console.log('   GET    /api/tasks              - List tasks (?state=&key=&kind=&limit=&offset=)');
  console.log('   GET    /api/tasks/:id          - Task status');
  console.log('   POST   /api/tasks/:id/cancel   - Cancel a task');
  console.log('   DELETE /api/tasks              - Remove finished tasks');
  console.log('   GET    /api/queue/stats        - Queue statistics');
  console.log('   POST   /api/queue/pause        - Stop starting new tasks');
  console.log('   POST   /api/queue/resume       - Resume starting tasks');
  console.log('   GET    /health                 - Health check');
  console.log('   GET    /metrics                - Prometheus metrics');
  console.log('');
  console.log('Press Ctrl+C to stop the server');
}

// Allow running directly
if (import.meta.url === `file://${process.argv[1]}`) {
  runHttpServer().catch((error: unknown) => {
    logger.error('Failed to start HTTP server', {}, error);
    process.exit(1);
  });
}
