import type { OpsQueueConfig } from './config/index.js';
import { createTaskStore, TaskStore } from './storage/index.js';
import { createExecutorRegistry, ExecutorRegistry } from './executors/index.js';
import { QueueManager, queueOptionsFromConfig, RetentionService } from './services/index.js';
import type { QueueManagerOptions } from './services/index.js';
import { createServiceContext } from './commands/context.js';
import type { ServiceContext } from './commands/types.js';
import { Logger, logger } from './utils/logger.js';

export interface QueueRuntimeOverrides {
  store?: TaskStore;
  executors?: ExecutorRegistry;
  queueOptions?: Partial<QueueManagerOptions>;
  logger?: Logger;
}

/**
 * Everything one process needs to serve the queue, wired from configuration
 */
export interface QueueRuntime {
  config: OpsQueueConfig;
  store: TaskStore;
  executors: ExecutorRegistry;
  queue: QueueManager;
  retention: RetentionService;
  context: ServiceContext;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createQueueRuntime(config: OpsQueueConfig, overrides: QueueRuntimeOverrides = {}): QueueRuntime {
  const log = overrides.logger ?? logger;
  const store = overrides.store ?? createTaskStore(config);
  const executors = overrides.executors ?? createExecutorRegistry(config);
  const queue = new QueueManager(
    store,
    executors,
    { ...queueOptionsFromConfig(config), ...overrides.queueOptions },
    log
  );
  const retention = new RetentionService(store, config.retention, log);

  return {
    config,
    store,
    executors,
    queue,
    retention,
    context: createServiceContext(queue, store),

    async start() {
      await queue.start();
      retention.start();
    },

    async stop() {
      retention.stop();
      await queue.shutdown();
      await store.close();
    },
  };
}
