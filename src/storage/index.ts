import { OpsQueueConfig } from '../config/index.js';
import { TaskStore } from './TaskStore.js';
import { FileTaskStore } from './FileTaskStore.js';
import { MemoryTaskStore } from './MemoryTaskStore.js';

/**
 * Create a task store based on configuration
 */
export function createTaskStore(config: OpsQueueConfig): TaskStore {
  switch (config.storage.provider) {
    case 'file':
      return new FileTaskStore(
        config.storage.fileStorage.dataDir,
        config.storage.fileStorage.lockTimeout
      );

    case 'memory':
      return new MemoryTaskStore();
  }
}

export * from './TaskStore.js';
export * from './TaskIndex.js';
export * from './FileTaskStore.js';
export * from './MemoryTaskStore.js';
