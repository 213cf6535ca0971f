import { OpsQueueConfig } from '../config/index.js';
import { ExecutorRegistry } from './registry.js';
import { createDockerExecutors } from './docker.js';
import type { CommandRunner } from './process.js';

/**
 * Registry with the bundled docker executors
 */
export function createExecutorRegistry(config: OpsQueueConfig, runner?: CommandRunner): ExecutorRegistry {
  const registry = new ExecutorRegistry();
  for (const executor of createDockerExecutors({ binary: config.executors.docker.binary, runner })) {
    registry.register(executor);
  }
  return registry;
}

export * from './types.js';
export * from './registry.js';
export * from './docker.js';
export * from './process.js';
