import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileTaskStore } from '../../src/storage/FileTaskStore.js';
import type { QueueManager } from '../../src/services/QueueManager.js';
import {
  createMockTaskInput,
  createTestDataDir,
  createTestQueue,
  removeTestDataDir,
  waitFor,
  waitForState,
} from '../fixtures/index.js';

/**
 * Failure recovery across process restarts
 *
 * Each "process" is a queue over its own FileTaskStore instance pointing at
 * the same data directory.
 */
describe('Failure Recovery', () => {
  let dataDir: string;
  const running: QueueManager[] = [];

  const startProcess = async (options: Parameters<typeof createTestQueue>[0] = {}) => {
    const store = new FileTaskStore(dataDir, 5000);
    const created = createTestQueue(options, store);
    await created.queue.start();
    running.push(created.queue);
    return created;
  };

  beforeEach(() => {
    dataDir = createTestDataDir();
  });

  afterEach(async () => {
    for (const queue of running.splice(0)) {
      await queue.shutdown();
    }
    removeTestDataDir(dataDir);
  });

  it('should retry a task left running by a crashed process', async () => {
    // What a crash leaves behind: a running task nobody is working on
    const crashed = new FileTaskStore(dataDir, 5000);
    await crashed.initialize();
    const task = await crashed.createTask(createMockTaskInput({ key: 'crash-key' }));
    await crashed.updateTask(task.id, { state: 'running', attemptCount: 1, startedAt: new Date() });
    await crashed.close();

    const { queue, executor } = await startProcess();

    const recovered = await waitForState(queue, task.id, ['succeeded']);
    expect(recovered.attemptCount).toBe(2);
    expect(executor.callsFor(task.id).map(call => call.attempt)).toEqual([2]);
  });

  it('should resume an attempt interrupted by shutdown in the next process', async () => {
    const first = await startProcess({ shutdownDrainMs: 50 });
    const submitted = await first.queue.submit({ kind: 'push', key: 'k', params: { script: ['hang', 'success'] } });
    await waitForState(first.queue, submitted.id, ['running']);
    await waitFor(() => first.executor.activeCalls === 1);

    await first.queue.shutdown();
    await first.store.close();

    const second = await startProcess();
    const task = await waitForState(second.queue, submitted.id, ['succeeded']);

    expect(task.attemptCount).toBe(2);
    expect(task.logs.map(entry => entry.message)).toContain('Attempt 2 started');
    expect(second.executor.callsFor(submitted.id).map(call => call.attempt)).toEqual([2]);
  });

  it('should carry pending tasks over in submission order', async () => {
    const first = await startProcess();
    first.queue.pause();
    const ids: string[] = [];
    for (let i = 0; i < 3; i++) {
      ids.push((await first.queue.submit({ kind: 'push', key: 'shared', params: { index: i } })).id);
    }
    await first.queue.shutdown();
    await first.store.close();

    const second = await startProcess();
    for (const id of ids) {
      await waitForState(second.queue, id, ['succeeded']);
    }

    expect(second.executor.calls.map(call => call.taskId)).toEqual(ids);
    expect(second.executor.overlaps).toEqual([]);
  });

  it('should keep finished history across restarts', async () => {
    const first = await startProcess();
    const submitted = await first.queue.submit({ kind: 'push', key: 'k', params: { script: ['fatal'] } });
    await waitForState(first.queue, submitted.id, ['failed']);
    await first.queue.shutdown();
    await first.store.close();

    const second = await startProcess();
    const task = await second.queue.getStatus(submitted.id);

    expect(task.state).toBe('failed');
    expect(task.lastError).toBe('permanent failure');
    expect(task.result?.errorType).toBe('fatal');
    expect(second.executor.calls).toEqual([]);
  });
});
