export * from './QueueManager.js';
export * from './WorkerPool.js';
export * from './RetentionService.js';
