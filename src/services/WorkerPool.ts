import type { RetryPosition } from '../config/index.js';
import type { Task, TaskFailureType, TaskUpdateInput } from '../types/index.js';
import { getErrorMessage } from '../types/index.js';
import type { TaskStore } from '../storage/index.js';
import { KeyedTaskQueue, QueueEntry } from '../queue/KeyedTaskQueue.js';
import type { ExecutionContext, ExecutionOutcome } from '../executors/types.js';
import type { ExecutorRegistry } from '../executors/registry.js';
import { AttemptTimeoutError, FatalExecutionError } from '../utils/errors.js';
import { BackoffPolicy, computeRetryDelayMs } from '../utils/backoff.js';
import { Logger, logger } from '../utils/logger.js';
import { metrics, QueueMetrics } from '../utils/metrics.js';

export interface WorkerPoolOptions {
  concurrency: number;
  attemptTimeoutMs: number;
  backoff: BackoffPolicy;
  retryPosition: RetryPosition;
  shutdownDrainMs: number;
}

type AbortCause = 'timeout' | 'cancel' | 'shutdown';

interface ActiveAttempt {
  task: Task;
  controller: AbortController;
  abortCause?: AbortCause;
  // Executor progress and log writes are accepted until the attempt settles
  writesOpen: boolean;
}

type AttemptResult =
  | { type: 'outcome'; outcome: ExecutionOutcome }
  | { type: 'error'; error: unknown }
  | { type: 'aborted'; cause: AbortCause };

interface Failure {
  reason: string;
  failureType: TaskFailureType;
}

/**
 * Fixed number of workers pulling from the keyed queue.
 * A worker holds the key of the entry it took until the attempt has been
 * recorded, so tasks sharing a key never run side by side.
 */
export class WorkerPool {
  private readonly active = new Map<string, ActiveAttempt>();
  private readonly cancelRequests = new Set<string>();
  private loops: Promise<void>[] = [];
  private started = false;
  private stopping = false;
  private readonly log: Logger;

  constructor(
    private readonly store: TaskStore,
    private readonly queue: KeyedTaskQueue,
    private readonly executors: ExecutorRegistry,
    private readonly options: WorkerPoolOptions,
    parentLogger: Logger = logger
  ) {
    this.log = parentLogger.child({ component: 'WorkerPool' });
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    for (let workerId = 0; workerId < this.options.concurrency; workerId++) {
      this.loops.push(this.workerLoop(workerId));
    }
    this.log.info('Worker pool started', { concurrency: this.options.concurrency });
  }

  /**
   * Stop taking work, let running attempts finish for up to shutdownDrainMs,
   * then abort the rest. Aborted attempts go back to pending.
   */
  async stop(): Promise<void> {
    if (!this.started || this.stopping) return;
    this.stopping = true;
    this.queue.close();

    const drained = Promise.all(this.loops);
    let timer: NodeJS.Timeout | undefined;
    const timedOut = await Promise.race([
      drained.then(() => false),
      new Promise<boolean>(resolve => {
        timer = setTimeout(() => resolve(true), this.options.shutdownDrainMs);
      }),
    ]);
    clearTimeout(timer);

    if (timedOut) {
      this.log.warn('Aborting attempts still running at shutdown', { running: this.active.size });
      for (const attempt of this.active.values()) {
        this.abort(attempt, 'shutdown');
      }
      await drained;
    }
    this.log.info('Worker pool stopped');
  }

  /**
   * Flag a dispatched task for cancellation. Returns false when no worker
   * holds the task.
   */
  requestCancel(taskId: string): boolean {
    if (!this.queue.isDispatched(taskId)) {
      return false;
    }
    this.cancelRequests.add(taskId);
    const attempt = this.active.get(taskId);
    if (attempt) {
      this.abort(attempt, 'cancel');
    }
    return true;
  }

  get busyWorkers(): number {
    return this.active.size;
  }

  get concurrency(): number {
    return this.options.concurrency;
  }

  activeTaskIds(): string[] {
    return Array.from(this.active.keys());
  }

  private abort(attempt: ActiveAttempt, cause: AbortCause): void {
    if (attempt.controller.signal.aborted) return;
    attempt.abortCause = cause;
    attempt.controller.abort(cause === 'timeout' ? new AttemptTimeoutError(this.options.attemptTimeoutMs) : cause);
  }

  private async workerLoop(workerId: number): Promise<void> {
    while (!this.stopping) {
      const entry = await this.queue.acquire();
      if (!entry) break;

      try {
        await this.runTask(entry);
      } catch (error) {
        // Store failures end up here; the pool keeps going
        this.log.error('Unexpected error while running task', { workerId, taskId: entry.id, key: entry.key }, error);
        await this.failUnexpectedly(entry, error);
      } finally {
        this.active.delete(entry.id);
        this.cancelRequests.delete(entry.id);
        this.queue.release(entry);
        this.updateGauges();
      }
    }
  }

  private isCancelRequested(taskId: string, task?: Task): boolean {
    return this.cancelRequests.has(taskId) || task?.cancelRequested === true;
  }

  private async runTask(entry: QueueEntry): Promise<void> {
    const log = this.log.child({ taskId: entry.id, key: entry.key });

    const current = await this.store.getTask(entry.id);
    if (!current || current.state !== 'pending') {
      log.debug('Dispatched task is no longer pending', { state: current?.state ?? 'missing' });
      return;
    }
    if (this.isCancelRequested(entry.id, current)) {
      await this.finishCancelled(entry.id, log);
      return;
    }

    const attempt = current.attemptCount + 1;
    const task = await this.store.transitionTask(entry.id, ['pending'], {
      state: 'running',
      attemptCount: attempt,
      startedAt: new Date(),
      nextAttemptAt: null,
      currentStep: `Attempt ${attempt} of ${current.maxAttempts}`,
    });
    if (!task) {
      log.debug('Task left pending before it could start');
      return;
    }

    const attemptLog = log.child({ kind: task.kind, attempt });
    attemptLog.info('Task started');
    await this.store.appendTaskLog(task.id, `Attempt ${attempt} started`);

    const controller = new AbortController();
    const activeAttempt: ActiveAttempt = { task, controller, writesOpen: true };
    this.active.set(task.id, activeAttempt);
    this.updateGauges();

    // Cancel may have landed while the running state was being written
    if (this.isCancelRequested(task.id)) {
      await this.finishCancelled(task.id, attemptLog);
      return;
    }

    const timer = metrics.startTimer(QueueMetrics.attemptDuration.name, { kind: task.kind });
    const startedAt = Date.now();
    const writes: Promise<void>[] = [];
    const result = await this.executeAttempt(activeAttempt, attempt, writes, attemptLog);
    const duration = Date.now() - startedAt;
    timer.stop();

    // Progress and log writes issued by the executor land before the final state
    activeAttempt.writesOpen = false;
    await Promise.all(writes);

    if (this.isCancelRequested(task.id) || (result.type === 'aborted' && result.cause === 'cancel')) {
      await this.finishCancelled(task.id, attemptLog);
      return;
    }

    if (result.type === 'aborted' && result.cause === 'shutdown') {
      await this.returnInterrupted(task, attemptLog);
      return;
    }

    if (result.type === 'outcome' && result.outcome.status === 'success') {
      await this.finish(task, {
        state: 'succeeded',
        finishedAt: new Date(),
        progress: 100,
        currentStep: 'Completed',
        lastError: null,
        result: { success: true, output: result.outcome.output, duration },
      }, attemptLog);
      return;
    }

    const failure = this.classify(result);
    await this.store.appendTaskLog(task.id, `Attempt ${attempt} failed: ${failure.reason}`);

    if (failure.failureType === 'fatal' || attempt >= task.maxAttempts) {
      await this.finish(task, {
        state: 'failed',
        finishedAt: new Date(),
        currentStep: failure.failureType === 'fatal' ? 'Failed' : 'Retries exhausted',
        lastError: failure.reason,
        result: { success: false, error: failure.reason, errorType: failure.failureType, duration },
      }, attemptLog);
      return;
    }

    await this.scheduleRetry(task, attempt, failure, attemptLog);
  }

  /**
   * Run the executor, giving up when the attempt times out or is aborted.
   * A late settlement of an abandoned call is only logged.
   */
  private executeAttempt(
    activeAttempt: ActiveAttempt,
    attempt: number,
    writes: Promise<void>[],
    log: Logger
  ): Promise<AttemptResult> {
    const { task, controller } = activeAttempt;
    const timeoutMs = this.options.attemptTimeoutMs;

    const context: ExecutionContext = {
      taskId: task.id,
      key: task.key,
      attempt,
      deadline: new Date(Date.now() + timeoutMs),
      signal: controller.signal,
      isCancelled: () => this.cancelRequests.has(task.id),
      reportProgress: (progress, step) => {
        if (!activeAttempt.writesOpen) return;
        record(this.store.updateTask(task.id, {
          progress: Math.max(0, Math.min(100, Math.round(progress))),
          currentStep: step,
        }));
      },
      log: message => {
        if (!activeAttempt.writesOpen) return;
        record(this.store.appendTaskLog(task.id, message));
      },
    };

    const record = (write: Promise<unknown>): void => {
      writes.push(write.then(
        () => undefined,
        (error: unknown) => {
          log.warn('Could not record executor progress', { error: getErrorMessage(error) });
        }
      ));
    };

    return new Promise<AttemptResult>(resolve => {
      let settled = false;
      const settle = (result: AttemptResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        controller.signal.removeEventListener('abort', onAbort);
        resolve(result);
      };

      const onAbort = (): void => {
        settle({ type: 'aborted', cause: activeAttempt.abortCause ?? 'cancel' });
      };
      controller.signal.addEventListener('abort', onAbort, { once: true });

      const timer = setTimeout(() => this.abort(activeAttempt, 'timeout'), timeoutMs);

      this.executors.execute(task.kind, task.params, context).then(
        outcome => {
          if (settled) {
            log.debug('Abandoned attempt settled late', { status: outcome.status });
          }
          settle({ type: 'outcome', outcome });
        },
        (error: unknown) => {
          if (settled) {
            log.debug('Abandoned attempt failed late', { error: getErrorMessage(error) });
          }
          settle({ type: 'error', error });
        }
      );
    });
  }

  private classify(result: AttemptResult): Failure {
    switch (result.type) {
      case 'aborted':
        return {
          reason: new AttemptTimeoutError(this.options.attemptTimeoutMs).message,
          failureType: 'timeout',
        };
      case 'error':
        return {
          reason: getErrorMessage(result.error),
          // Unclassified exceptions are treated as transient
          failureType: result.error instanceof FatalExecutionError ? 'fatal' : 'retryable',
        };
      case 'outcome':
        return result.outcome.status === 'fatal'
          ? { reason: result.outcome.reason, failureType: 'fatal' }
          : { reason: result.outcome.status === 'retryable' ? result.outcome.reason : 'unknown', failureType: 'retryable' };
    }
  }

  private async scheduleRetry(task: Task, attempt: number, failure: Failure, log: Logger): Promise<void> {
    const delayMs = computeRetryDelayMs(attempt, this.options.backoff);
    const readyAt = this.queue.now() + delayMs;

    const updated = await this.store.transitionTask(task.id, ['running'], {
      state: 'pending',
      nextAttemptAt: new Date(Date.now() + delayMs),
      lastError: failure.reason,
      currentStep: `Retrying in ${delayMs}ms`,
    });
    if (!updated) {
      log.warn('Task changed while scheduling retry');
      return;
    }

    metrics.incrementCounter(QueueMetrics.taskRetries.name, { kind: task.kind });
    log.warn('Attempt failed, retry scheduled', {
      reason: failure.reason,
      failureType: failure.failureType,
      delayMs,
      nextAttempt: attempt + 1,
    });

    if (this.isCancelRequested(task.id, updated)) {
      await this.finishCancelled(task.id, log);
      return;
    }
    if (this.stopping) {
      // Picked up again by recovery on next start
      return;
    }

    // Still holding the key: nothing else with this key can start before the retry
    this.queue.enqueue(
      { id: task.id, key: task.key, sequence: task.sequence, readyAt },
      this.options.retryPosition
    );
  }

  private async returnInterrupted(task: Task, log: Logger): Promise<void> {
    const exhausted = task.attemptCount >= task.maxAttempts;
    const reason = 'Attempt interrupted by shutdown';
    const update: TaskUpdateInput = exhausted
      ? {
          state: 'failed',
          finishedAt: new Date(),
          lastError: reason,
          result: { success: false, error: reason, errorType: 'retryable' },
        }
      : { state: 'pending', lastError: reason, currentStep: 'Interrupted' };

    const updated = await this.store.transitionTask(task.id, ['running'], update);
    if (updated && exhausted) {
      metrics.incrementCounter(QueueMetrics.tasksFinished.name, { kind: task.kind, state: 'failed' });
    }
    log.warn('Attempt interrupted by shutdown', { state: updated?.state ?? 'unknown' });
  }

  private async finish(task: Task, update: TaskUpdateInput, log: Logger): Promise<void> {
    const updated = await this.store.transitionTask(task.id, ['running'], update);
    if (!updated) {
      log.warn('Task changed before its result could be recorded');
      return;
    }
    metrics.incrementCounter(QueueMetrics.tasksFinished.name, { kind: updated.kind, state: updated.state });
    if (updated.state === 'succeeded') {
      log.info('Task succeeded', { attempts: updated.attemptCount });
    } else {
      log.warn('Task failed', { attempts: updated.attemptCount, error: updated.result?.error });
    }
  }

  private async finishCancelled(taskId: string, log: Logger): Promise<void> {
    const updated = await this.store.transitionTask(taskId, ['pending', 'running'], {
      state: 'cancelled',
      cancelRequested: true,
      finishedAt: new Date(),
      nextAttemptAt: null,
      currentStep: 'Cancelled',
    });
    if (updated) {
      metrics.incrementCounter(QueueMetrics.tasksFinished.name, { kind: updated.kind, state: 'cancelled' });
      log.info('Task cancelled', { attempts: updated.attemptCount });
    }
  }

  private async failUnexpectedly(entry: QueueEntry, error: unknown): Promise<void> {
    const reason = `Internal error: ${getErrorMessage(error)}`;
    try {
      await this.store.transitionTask(entry.id, ['running'], {
        state: 'failed',
        finishedAt: new Date(),
        lastError: reason,
        result: { success: false, error: reason, errorType: 'fatal' },
      });
    } catch (storeError) {
      this.log.error('Could not record internal failure', { taskId: entry.id }, storeError);
    }
  }

  private updateGauges(): void {
    metrics.setGauge(QueueMetrics.tasksRunning.name, this.active.size);
    metrics.setGauge(QueueMetrics.tasksPending.name, this.queue.size);
  }
}
