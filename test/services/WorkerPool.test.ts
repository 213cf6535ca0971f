import { describe, it, expect, afterEach } from 'vitest';
import type { QueueManager, QueueManagerOptions } from '../../src/services/QueueManager.js';
import type { Task, TaskParams } from '../../src/types/index.js';
import { isTerminalState } from '../../src/types/index.js';
import { ScriptedExecutor, createTestQueue, waitFor, waitForState } from '../fixtures/index.js';
import type { ScriptStep } from '../fixtures/index.js';

/**
 * Attempt handling in the worker pool, observed through the queue:
 * retries, timeouts, failure classification and per-key exclusion.
 */
describe('WorkerPool', () => {
  let queue: QueueManager;
  let executor: ScriptedExecutor;

  const setup = async (options: Partial<QueueManagerOptions> = {}): Promise<void> => {
    ({ queue, executor } = createTestQueue(options));
    await queue.start();
  };

  const push = (key: string, params: TaskParams = {}) => queue.submit({ kind: 'push', key, params });

  const messages = (task: Task): string[] => task.logs.map(entry => entry.message);

  afterEach(async () => {
    await queue.shutdown();
  });

  describe('retries', () => {
    it('should succeed on the third attempt after two transient failures', async () => {
      await setup();
      const submitted = await push('k', { script: ['retryable', 'retryable', 'success'] });

      const task = await waitForState(queue, submitted.id, ['succeeded', 'failed']);

      expect(task.state).toBe('succeeded');
      expect(task.attemptCount).toBe(3);
      expect(task.lastError).toBeUndefined();
      expect(task.nextAttemptAt).toBeUndefined();
      expect(task.result?.output).toEqual({ attempt: 3 });
      expect(executor.callsFor(task.id).map(call => call.attempt)).toEqual([1, 2, 3]);
      expect(messages(task)).toEqual([
        'Attempt 1 started',
        'attempt 1 on k',
        'Attempt 1 failed: transient failure on attempt 1',
        'Attempt 2 started',
        'attempt 2 on k',
        'Attempt 2 failed: transient failure on attempt 2',
        'Attempt 3 started',
        'attempt 3 on k',
      ]);
    });

    it('should fail once attempts are exhausted', async () => {
      await setup();
      const submitted = await push('k', { script: ['retryable'] });

      const task = await waitForState(queue, submitted.id, ['failed']);

      expect(task.attemptCount).toBe(3);
      expect(task.currentStep).toBe('Retries exhausted');
      expect(task.lastError).toBe('transient failure on attempt 3');
      expect(task.result).toMatchObject({
        success: false,
        error: 'transient failure on attempt 3',
        errorType: 'retryable',
      });
      expect(executor.callsFor(task.id)).toHaveLength(3);
    });

    it('should honour a lower attempt limit', async () => {
      await setup({ maxAttempts: 1 });
      const submitted = await push('k', { script: ['retryable', 'success'] });

      const task = await waitForState(queue, submitted.id, ['failed']);

      expect(task.maxAttempts).toBe(1);
      expect(task.attemptCount).toBe(1);
    });

    it('should treat unclassified exceptions as transient', async () => {
      await setup();
      const submitted = await push('k', { script: ['throw', 'success'] });

      const task = await waitForState(queue, submitted.id, ['succeeded', 'failed']);

      expect(task.state).toBe('succeeded');
      expect(task.attemptCount).toBe(2);
      expect(messages(task)).toContain('Attempt 1 failed: thrown on attempt 1');
    });
  });

  describe('fatal failures', () => {
    it('should fail immediately on a fatal outcome', async () => {
      await setup();
      const submitted = await push('k', { script: ['fatal', 'success'] });

      const task = await waitForState(queue, submitted.id, ['failed']);

      expect(task.attemptCount).toBe(1);
      expect(task.currentStep).toBe('Failed');
      expect(task.lastError).toBe('permanent failure');
      expect(task.result?.errorType).toBe('fatal');
      expect(executor.callsFor(task.id)).toHaveLength(1);
    });

    it('should fail immediately on a thrown FatalExecutionError', async () => {
      await setup();
      const submitted = await push('k', { script: ['throwFatal'] });

      const task = await waitForState(queue, submitted.id, ['failed']);

      expect(task.attemptCount).toBe(1);
      expect(task.lastError).toBe('thrown fatal failure');
      expect(task.result?.errorType).toBe('fatal');
    });
  });

  describe('timeouts', () => {
    it('should retry an attempt that exceeds its deadline', async () => {
      await setup({ attemptTimeoutMs: 50 });
      const submitted = await push('k', { script: ['hang', 'success'] });

      const task = await waitForState(queue, submitted.id, ['succeeded', 'failed']);

      expect(task.state).toBe('succeeded');
      expect(task.attemptCount).toBe(2);
      expect(messages(task)).toContain('Attempt 1 failed: Attempt timed out after 50ms');
    });

    it('should record a timeout as the final error when no attempts remain', async () => {
      await setup({ attemptTimeoutMs: 50, maxAttempts: 1 });
      const submitted = await push('k', { script: ['hang'] });

      const task = await waitForState(queue, submitted.id, ['failed']);

      expect(task.lastError).toBe('Attempt timed out after 50ms');
      expect(task.result?.errorType).toBe('timeout');
    });
  });

  describe('ordering within a key', () => {
    it('should retry before later tasks of the same key when retrying at the head', async () => {
      await setup({ retryPosition: 'head' });
      const first = await push('k', { script: ['retryable', 'success'] });
      const second = await push('k');

      await waitForState(queue, second.id, ['succeeded']);

      const label = (taskId: string): string => (taskId === first.id ? 'first' : 'second');
      expect(executor.calls.map(call => `${label(call.taskId)}:${call.attempt}`)).toEqual([
        'first:1',
        'first:2',
        'second:1',
      ]);
    });

    it('should let later tasks go first when retrying at the tail', async () => {
      await setup({ retryPosition: 'tail' });
      const first = await push('k', { script: ['retryable', 'success'] });
      const second = await push('k');

      await waitForState(queue, first.id, ['succeeded']);

      const label = (taskId: string): string => (taskId === first.id ? 'first' : 'second');
      expect(executor.calls.map(call => `${label(call.taskId)}:${call.attempt}`)).toEqual([
        'first:1',
        'second:1',
        'first:2',
      ]);
      expect((await queue.getStatus(second.id)).state).toBe('succeeded');
    });

    it('should run different keys side by side', async () => {
      await setup();
      const a = await push('a', { gate: 'a' });
      const b = await push('b', { gate: 'b' });

      await waitFor(() => executor.activeCalls === 2);
      executor.open('a');
      executor.open('b');

      await waitForState(queue, a.id, ['succeeded']);
      await waitForState(queue, b.id, ['succeeded']);
      expect(executor.maxConcurrent).toBe(2);
    });
  });

  describe('single flight per key', () => {
    // Small deterministic generator so failures reproduce
    const random = (seed: number) => {
      let state = seed;
      return (): number => {
        state = (state * 1103515245 + 12345) % 2147483648;
        return state / 2147483648;
      };
    };

    it('should never overlap attempts for one key under a random workload', async () => {
      await setup({ concurrency: 3 });
      const next = random(42);
      const keys = ['alpha', 'beta', 'gamma', 'delta'];
      const steps: ScriptStep[] = ['success', 'retryable', 'fatal', 'throw'];

      const submitted: Task[] = [];
      for (let i = 0; i < 40; i++) {
        const key = keys[Math.floor(next() * keys.length)] ?? 'alpha';
        const script = [0, 1, 2].map(() => steps[Math.floor(next() * steps.length)] ?? 'success');
        submitted.push(await push(key, { script, delayMs: Math.floor(next() * 4) }));
      }

      await waitFor(async () => {
        const tasks = await queue.listStatus();
        return tasks.every(task => isTerminalState(task.state));
      }, 10000);

      const tasks = await queue.listStatus();
      expect(tasks).toHaveLength(40);
      expect(executor.overlaps).toEqual([]);
      expect(executor.maxConcurrent).toBeLessThanOrEqual(3);
      for (const task of tasks) {
        expect(task.attemptCount).toBeGreaterThanOrEqual(1);
        expect(task.attemptCount).toBeLessThanOrEqual(task.maxAttempts);
        expect(executor.callsFor(task.id)).toHaveLength(task.attemptCount);
      }

      // Tasks of a key run one after another, in submission order
      for (const key of keys) {
        const runOrder = executor.calls
          .filter(call => call.key === key)
          .map(call => call.taskId)
          .filter((taskId, index, all) => index === 0 || all[index - 1] !== taskId);
        const submissionOrder = submitted.filter(task => task.key === key).map(task => task.id);
        expect(runOrder).toEqual(submissionOrder);
      }
    });
  });
});
