import Joi from 'joi';
import { tmpdir } from 'os';
import { join } from 'path';
import { rmSync, existsSync } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import type { Task, TaskCreateInput, TaskKind, TaskParams } from '../../src/types/index.js';
import { Outcome } from '../../src/executors/types.js';
import type { ExecutionContext, ExecutionOutcome, TaskExecutor } from '../../src/executors/types.js';
import { ExecutorRegistry } from '../../src/executors/registry.js';
import { FatalExecutionError } from '../../src/utils/errors.js';
import { MemoryTaskStore } from '../../src/storage/MemoryTaskStore.js';
import type { TaskStore } from '../../src/storage/TaskStore.js';
import { QueueManager, QueueManagerOptions } from '../../src/services/QueueManager.js';
import { loadConfig, OpsQueueConfig } from '../../src/config/index.js';

export const createMockTaskInput = (overrides?: Partial<TaskCreateInput>): TaskCreateInput => {
  return {
    kind: 'push',
    key: 'registry.example.com/team/app:1.0.0',
    params: { imageName: 'registry.example.com/team/app', tag: '1.0.0' },
    maxAttempts: 3,
    ...overrides,
  };
};

export const createMockTask = (overrides?: Partial<Task>): Task => {
  return {
    id: uuidv4(),
    sequence: 0,
    key: 'registry.example.com/team/app:1.0.0',
    kind: 'push',
    params: { imageName: 'registry.example.com/team/app', tag: '1.0.0' },
    state: 'pending',
    attemptCount: 0,
    maxAttempts: 3,
    cancelRequested: false,
    createdAt: new Date(),
    progress: 0,
    logs: [],
    ...overrides,
  };
};

export const createTestDataDir = (suffix: string = ''): string => {
  return join(tmpdir(), `opsqueue-test-${Date.now()}-${uuidv4().slice(0, 8)}${suffix}`);
};

export const removeTestDataDir = (dir: string): void => {
  if (existsSync(dir)) {
    rmSync(dir, { recursive: true, force: true });
  }
};

export const sleep = (ms: number): Promise<void> => {
  return new Promise(resolve => setTimeout(resolve, ms));
};

/**
 * Poll until the predicate holds or the timeout passes
 */
export async function waitFor(
  predicate: () => boolean | Promise<boolean>,
  timeoutMs: number = 5000,
  intervalMs: number = 5
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await predicate())) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await sleep(intervalMs);
  }
}

export async function waitForState(
  queue: QueueManager,
  taskId: string,
  states: Task['state'][],
  timeoutMs: number = 5000
): Promise<Task> {
  let task = await queue.getStatus(taskId);
  await waitFor(async () => {
    task = await queue.getStatus(taskId);
    return states.includes(task.state);
  }, timeoutMs);
  return task;
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function createDeferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * What the scripted executor does on a given attempt:
 * success, a retryable or fatal outcome, a thrown error, or hang until aborted.
 */
export type ScriptStep = 'success' | 'retryable' | 'fatal' | 'throw' | 'throwFatal' | 'hang';

const SCRIPT_STEPS: readonly ScriptStep[] = ['success', 'retryable', 'fatal', 'throw', 'throwFatal', 'hang'];

function isScriptStep(value: unknown): value is ScriptStep {
  return SCRIPT_STEPS.some(step => step === value);
}

export interface ExecutorCall {
  taskId: string;
  key: string;
  attempt: number;
  params: TaskParams;
}

/**
 * In-process executor driven by task params:
 *   script   - steps by attempt number (last step repeats), default success
 *   gate     - name of a gate the call waits on before acting
 *   delayMs  - time spent before acting
 *   target   - used as the derived key
 * Tracks overlapping calls per key.
 */
export class ScriptedExecutor implements TaskExecutor {
  readonly description = 'Scripted executor for tests';
  readonly paramsSchema = Joi.object().unknown(true);
  readonly calls: ExecutorCall[] = [];
  readonly overlaps: string[] = [];
  maxConcurrent = 0;

  private readonly runningKeys = new Set<string>();
  private readonly gates = new Map<string, Deferred<void>>();
  private active = 0;

  constructor(readonly kind: TaskKind = 'push') {}

  deriveKey(params: TaskParams): string {
    return typeof params.target === 'string' ? params.target : '';
  }

  gate(name: string): Deferred<void> {
    const existing = this.gates.get(name);
    if (existing) return existing;
    const created = createDeferred();
    this.gates.set(name, created);
    return created;
  }

  open(name: string): void {
    this.gate(name).resolve();
  }

  get activeCalls(): number {
    return this.active;
  }

  callsFor(taskId: string): ExecutorCall[] {
    return this.calls.filter(call => call.taskId === taskId);
  }

  async execute(params: TaskParams, context: ExecutionContext): Promise<ExecutionOutcome> {
    this.calls.push({ taskId: context.taskId, key: context.key, attempt: context.attempt, params });
    if (this.runningKeys.has(context.key)) {
      this.overlaps.push(context.key);
    }
    this.runningKeys.add(context.key);
    this.active++;
    this.maxConcurrent = Math.max(this.maxConcurrent, this.active);

    try {
      context.log(`attempt ${context.attempt} on ${context.key}`);

      if (typeof params.gate === 'string') {
        await Promise.race([this.gate(params.gate).promise, abortion(context.signal)]);
      }
      if (typeof params.delayMs === 'number' && params.delayMs > 0) {
        await Promise.race([sleep(params.delayMs), abortion(context.signal)]);
      }

      const step = stepFor(params, context.attempt);
      switch (step) {
        case 'success':
          context.reportProgress(50, 'Halfway');
          return Outcome.success({ attempt: context.attempt });
        case 'retryable':
          return Outcome.retryable(`transient failure on attempt ${context.attempt}`);
        case 'fatal':
          return Outcome.fatal('permanent failure');
        case 'throw':
          throw new Error(`thrown on attempt ${context.attempt}`);
        case 'throwFatal':
          throw new FatalExecutionError('thrown fatal failure');
        case 'hang':
          await abortion(context.signal);
          return Outcome.retryable('unreachable');
      }
    } finally {
      this.active--;
      this.runningKeys.delete(context.key);
    }
  }
}

function stepFor(params: TaskParams, attempt: number): ScriptStep {
  const script = Array.isArray(params.script) ? params.script.filter(isScriptStep) : [];
  if (script.length === 0) return 'success';
  return script[Math.min(attempt, script.length) - 1] ?? 'success';
}

function abortion(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

export const TEST_QUEUE_OPTIONS: QueueManagerOptions = {
  concurrency: 2,
  maxAttempts: 3,
  attemptTimeoutMs: 5000,
  backoff: { baseDelayMs: 5, maxDelayMs: 20 },
  retryPosition: 'head',
  shutdownDrainMs: 200,
};

export interface TestQueue {
  queue: QueueManager;
  store: TaskStore;
  executor: ScriptedExecutor;
  registry: ExecutorRegistry;
}

export function createTestQueue(
  options: Partial<QueueManagerOptions> = {},
  store: TaskStore = new MemoryTaskStore(),
  executor: ScriptedExecutor = new ScriptedExecutor()
): TestQueue {
  const registry = new ExecutorRegistry().register(executor);
  const queue = new QueueManager(store, registry, { ...TEST_QUEUE_OPTIONS, ...options });
  return { queue, store, executor, registry };
}

export function createTestConfig(env: Record<string, string> = {}): OpsQueueConfig {
  return loadConfig({
    OPSQUEUE_STORAGE_PROVIDER: 'memory',
    OPSQUEUE_RETRY_BASE_DELAY_MS: '5',
    OPSQUEUE_RETRY_MAX_DELAY_MS: '20',
    OPSQUEUE_SHUTDOWN_DRAIN_MS: '200',
    ...env,
  });
}
