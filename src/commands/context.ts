/**
 * Service context creation for command handlers
 */

import type { QueueManager } from '../services/QueueManager.js';
import type { TaskStore } from '../storage/TaskStore.js';
import type { ServiceContext } from './types.js';

export function createServiceContext(queue: QueueManager, store: TaskStore): ServiceContext {
  return {
    queue,
    store,
  };
}
