import type { OpsQueueConfig } from '../config/index.js';
import type {
  CancelOutcome,
  QueueStats,
  Task,
  TaskFilters,
} from '../types/index.js';
import { isTerminalState } from '../types/index.js';
import type { TaskStore } from '../storage/index.js';
import { KeyedTaskQueue } from '../queue/KeyedTaskQueue.js';
import type { Clock } from '../queue/KeyedTaskQueue.js';
import type { ExecutorRegistry } from '../executors/registry.js';
import { WorkerPool, WorkerPoolOptions } from './WorkerPool.js';
import { NotFoundError, QueueClosedError } from '../utils/errors.js';
import { submitTaskSchema, taskFiltersSchema, validate } from '../utils/validation.js';
import { Logger, logger } from '../utils/logger.js';
import { metrics, QueueMetrics } from '../utils/metrics.js';

export interface QueueManagerOptions extends WorkerPoolOptions {
  maxAttempts: number;
  clock?: Clock;
}

export interface SubmitTaskInput {
  kind: string;
  key?: string;
  params?: unknown;
}

type Lifecycle = 'created' | 'initialized' | 'starting' | 'running' | 'stopped';

export function queueOptionsFromConfig(config: OpsQueueConfig): QueueManagerOptions {
  return {
    concurrency: config.queue.concurrency,
    maxAttempts: config.queue.maxAttempts,
    attemptTimeoutMs: config.queue.attemptTimeoutMs,
    backoff: { baseDelayMs: config.queue.baseDelayMs, maxDelayMs: config.queue.maxDelayMs },
    retryPosition: config.queue.retryPosition,
    shutdownDrainMs: config.queue.shutdownDrainMs,
  };
}

/**
 * Owns admission, the pending order and the query surface.
 * One instance per process; construct, start(), and shutdown().
 */
export class QueueManager {
  private readonly queue: KeyedTaskQueue;
  private readonly pool: WorkerPool;
  private readonly log: Logger;
  private lifecycle: Lifecycle = 'created';
  private starting: Promise<void> | null = null;
  private initializing: Promise<void> | null = null;
  // Submissions writing to the store; recovery waits for them
  private readonly admitting = new Set<Promise<Task>>();

  constructor(
    private readonly store: TaskStore,
    private readonly executors: ExecutorRegistry,
    private readonly options: QueueManagerOptions,
    parentLogger: Logger = logger
  ) {
    this.log = parentLogger.child({ component: 'QueueManager' });
    this.queue = new KeyedTaskQueue(options.clock);
    this.pool = new WorkerPool(store, this.queue, executors, options, parentLogger);
  }

  /**
   * Open the store without starting workers (read-only use)
   */
  async initialize(): Promise<void> {
    if (this.lifecycle !== 'created') return;
    this.initializing ??= (async () => {
      await this.store.initialize();
      if (this.lifecycle === 'created') this.lifecycle = 'initialized';
    })();
    try {
      await this.initializing;
    } catch (error) {
      this.initializing = null;
      throw error;
    }
  }

  /**
   * Recover tasks left over by a previous run and start the workers
   */
  async start(): Promise<void> {
    if (this.lifecycle === 'stopped') {
      throw new QueueClosedError();
    }
    if (this.starting) return this.starting;
    if (this.lifecycle === 'running') return;

    this.starting = (async () => {
      await this.initialize();
      this.lifecycle = 'starting';
      await Promise.allSettled([...this.admitting]);
      await this.recover();
      this.pool.start();
      this.lifecycle = 'running';
      this.log.info('Queue started', { concurrency: this.options.concurrency, maxAttempts: this.options.maxAttempts });
    })();

    try {
      await this.starting;
    } finally {
      this.starting = null;
    }
  }

  /**
   * Reject new submissions and stop the workers
   */
  async shutdown(): Promise<void> {
    if (this.lifecycle === 'stopped') return;
    if (this.starting) await this.starting;
    this.lifecycle = 'stopped';
    await this.pool.stop();
    this.queue.close();
    this.log.info('Queue shut down');
  }

  get isAccepting(): boolean {
    return this.lifecycle !== 'stopped';
  }

  async submit(input: SubmitTaskInput): Promise<Task> {
    if (this.lifecycle === 'stopped') {
      throw new QueueClosedError();
    }
    const submission = validate(submitTaskSchema, input);
    const prepared = this.executors.prepare(submission.kind, submission.params, submission.key);

    // Recovery reads the store; let it finish so the new task is enqueued once
    if (this.starting) await this.starting;

    const admission = (async () => {
      await this.initialize();
      return this.store.createTask({
        kind: prepared.kind,
        key: prepared.key,
        params: prepared.params,
        maxAttempts: this.options.maxAttempts,
      });
    })();
    this.admitting.add(admission);
    let task: Task;
    try {
      task = await admission;
    } finally {
      this.admitting.delete(admission);
    }

    // A start() that began meanwhile enqueues it during recovery
    if (this.lifecycle === 'running') {
      this.queue.enqueue({ id: task.id, key: task.key, sequence: task.sequence, readyAt: this.queue.now() });
    }

    metrics.incrementCounter(QueueMetrics.tasksSubmitted.name, { kind: task.kind });
    metrics.setGauge(QueueMetrics.tasksPending.name, this.queue.size);
    this.log.info('Task submitted', { taskId: task.id, key: task.key, kind: task.kind });
    return task;
  }

  async getStatus(taskId: string): Promise<Task> {
    const task = await this.store.getTask(taskId);
    if (!task) {
      throw new NotFoundError(`Task ${taskId} not found`);
    }
    return task;
  }

  async listStatus(filters: TaskFilters = {}): Promise<Task[]> {
    const validFilters = validate(taskFiltersSchema, filters);
    return this.store.listTasks(validFilters);
  }

  /**
   * Pending tasks are cancelled on the spot; running ones are flagged and
   * settle at the worker's next checkpoint; finished ones are left alone.
   */
  async cancel(taskId: string): Promise<CancelOutcome> {
    if (this.queue.remove(taskId)) {
      const cancelled = await this.cancelPending(taskId);
      if (cancelled) return cancelled;
    }

    const requested = this.pool.requestCancel(taskId);
    if (requested) {
      const flagged = await this.store.transitionTask(taskId, ['pending', 'running'], { cancelRequested: true });
      if (flagged) {
        this.log.info('Cancellation requested for running task', { taskId, key: flagged.key });
        return { accepted: true, outcome: 'cancel_requested', task: flagged };
      }
    }

    const task = await this.store.getTask(taskId);
    if (!task) {
      throw new NotFoundError(`Task ${taskId} not found`);
    }
    if (isTerminalState(task.state)) {
      // The worker may already have honoured this request
      if (requested && task.state === 'cancelled') {
        return { accepted: true, outcome: 'cancelled', finalState: 'cancelled', task };
      }
      return { accepted: false, outcome: 'already_terminal', finalState: task.state, task };
    }

    // Not scheduled in this process (workers not started yet)
    if (task.state === 'pending' && !this.queue.isDispatched(taskId)) {
      const cancelled = await this.cancelPending(taskId);
      if (cancelled) return cancelled;
    }

    const flagged = await this.store.transitionTask(taskId, ['pending', 'running'], { cancelRequested: true });
    if (flagged) {
      return { accepted: true, outcome: 'cancel_requested', task: flagged };
    }
    // Finished in the meantime
    return this.cancel(taskId);
  }

  private async cancelPending(taskId: string): Promise<CancelOutcome | null> {
    const task = await this.store.transitionTask(taskId, ['pending'], {
      state: 'cancelled',
      cancelRequested: true,
      finishedAt: new Date(),
      nextAttemptAt: null,
      currentStep: 'Cancelled',
    });
    if (!task) return null;

    metrics.incrementCounter(QueueMetrics.tasksFinished.name, { kind: task.kind, state: 'cancelled' });
    this.log.info('Pending task cancelled', { taskId, key: task.key });
    return { accepted: true, outcome: 'cancelled', finalState: 'cancelled', task };
  }

  /**
   * Evict every finished task now
   */
  async clearFinished(): Promise<number> {
    const removed = await this.store.deleteFinishedTasks();
    metrics.incrementCounter(QueueMetrics.tasksEvicted.name, {}, removed.length);
    this.log.info('Cleared finished tasks', { removed: removed.length });
    return removed.length;
  }

  pause(): void {
    this.queue.pause();
    this.log.info('Queue paused');
  }

  resume(): void {
    this.queue.resume();
    this.log.info('Queue resumed');
  }

  async getQueueStats(): Promise<QueueStats> {
    const counts = await this.store.countByState();
    const all = await this.store.listTasks();
    return {
      counts,
      total: all.length,
      concurrency: this.pool.concurrency,
      busyWorkers: this.pool.busyWorkers,
      paused: this.queue.isPaused(),
      closed: this.lifecycle === 'stopped',
      lockedKeys: this.queue.getLockedKeys(),
      runningTasks: all.filter(task => task.state === 'running'),
      recentTasks: all.slice(-10).reverse(),
    };
  }

  /**
   * Put tasks interrupted by a crash back in line and re-enqueue every
   * pending task in admission order
   */
  private async recover(): Promise<void> {
    const tasks = await this.store.listTasks();
    let requeued = 0;

    for (const task of tasks) {
      let current: Task | null = task;

      if (task.state === 'running') {
        current = await this.recoverRunning(task);
      }
      if (!current || current.state !== 'pending') continue;

      if (current.cancelRequested) {
        await this.cancelPending(current.id);
        continue;
      }

      const waitMs = current.nextAttemptAt ? Math.max(0, current.nextAttemptAt.getTime() - Date.now()) : 0;
      this.queue.enqueue({
        id: current.id,
        key: current.key,
        sequence: current.sequence,
        readyAt: this.queue.now() + waitMs,
      });
      requeued++;
    }

    if (requeued > 0) {
      this.log.info('Recovered pending tasks', { requeued });
    }
  }

  private async recoverRunning(task: Task): Promise<Task | null> {
    const reason = 'Attempt interrupted by restart';
    if (task.cancelRequested) {
      return this.store.transitionTask(task.id, ['running'], {
        state: 'cancelled',
        finishedAt: new Date(),
        currentStep: 'Cancelled',
      });
    }
    if (task.attemptCount >= task.maxAttempts) {
      this.log.warn('Interrupted task has no attempts left', { taskId: task.id, key: task.key });
      return this.store.transitionTask(task.id, ['running'], {
        state: 'failed',
        finishedAt: new Date(),
        lastError: reason,
        result: { success: false, error: reason, errorType: 'retryable' },
      });
    }
    this.log.warn('Returning interrupted task to pending', { taskId: task.id, key: task.key });
    return this.store.transitionTask(task.id, ['running'], {
      state: 'pending',
      lastError: reason,
      currentStep: 'Interrupted',
    });
  }
}
