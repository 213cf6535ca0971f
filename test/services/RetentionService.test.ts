import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RetentionService } from '../../src/services/RetentionService.js';
import { MemoryTaskStore } from '../../src/storage/MemoryTaskStore.js';
import { createMockTaskInput } from '../fixtures/index.js';

describe('RetentionService', () => {
  let store: MemoryTaskStore;
  let retention: RetentionService;

  const finishedAt = (iso: string) => new Date(iso);

  beforeEach(async () => {
    store = new MemoryTaskStore();
    await store.initialize();
    retention = new RetentionService(store, { retentionMinutes: 60, reaperIntervalMinutes: 1 });
  });

  afterEach(async () => {
    retention.stop();
    await store.close();
  });

  describe('reapExpiredTasks', () => {
    it('should evict finished tasks older than the retention window', async () => {
      const old = await store.createTask(createMockTaskInput({ key: 'a' }));
      const recent = await store.createTask(createMockTaskInput({ key: 'b' }));
      const running = await store.createTask(createMockTaskInput({ key: 'c' }));
      await store.updateTask(old.id, { state: 'succeeded', finishedAt: finishedAt('2026-04-01T10:00:00.000Z') });
      await store.updateTask(recent.id, { state: 'failed', finishedAt: finishedAt('2026-04-01T11:30:00.000Z') });
      await store.updateTask(running.id, { state: 'running' });

      const result = await retention.reapExpiredTasks(new Date('2026-04-01T12:00:00.000Z'));

      expect(result).toEqual({ reaped: 1, errors: [] });
      expect(await store.getTask(old.id)).toBeNull();
      expect(await store.getTask(recent.id)).not.toBeNull();
      expect(await store.getTask(running.id)).not.toBeNull();
    });

    it('should report store failures instead of throwing', async () => {
      await store.close();

      const result = await retention.reapExpiredTasks();

      expect(result.reaped).toBe(0);
      expect(result.errors).toEqual(['Failed to evict finished tasks: Task store not initialized. Call initialize() first.']);
    });
  });

  describe('start and stop', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('should sweep on every interval', async () => {
      vi.useFakeTimers();
      const sweep = vi.spyOn(retention, 'reapExpiredTasks');

      retention.start();
      expect(retention.isRunning()).toBe(true);

      await vi.advanceTimersByTimeAsync(60 * 1000);
      expect(sweep).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(60 * 1000);
      expect(sweep).toHaveBeenCalledTimes(2);

      retention.stop();
      expect(retention.isRunning()).toBe(false);

      await vi.advanceTimersByTimeAsync(60 * 1000);
      expect(sweep).toHaveBeenCalledTimes(2);
    });
  });
});
