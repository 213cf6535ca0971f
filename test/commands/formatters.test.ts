import { describe, it, expect } from 'vitest';
import stripAnsi from 'strip-ansi';
import {
  formatCommandResult,
  formatQueueStats,
  formatRelativeTime,
  formatTask,
  formatTaskList,
  formatTaskState,
  getVisualWidth,
  padEndVisual,
} from '../../src/commands/formatters.js';
import type { QueueStats } from '../../src/types/index.js';
import { createMockTask } from '../fixtures/index.js';

const lines = (text: string): string[] => stripAnsi(text).split('\n');

describe('Formatters', () => {
  describe('formatRelativeTime', () => {
    const now = new Date('2026-03-01T12:00:00.000Z');
    const ago = (ms: number) => new Date(now.getTime() - ms);

    it('should pick the largest whole unit', () => {
      expect(formatRelativeTime(ago(0), now)).toBe('0 secs ago');
      expect(formatRelativeTime(ago(1000), now)).toBe('1 sec ago');
      expect(formatRelativeTime(ago(90_000), now)).toBe('1 min ago');
      expect(formatRelativeTime(ago(2 * 3600_000 + 59_000), now)).toBe('2 hours ago');
      expect(formatRelativeTime(ago(3 * 86400_000), now)).toBe('3 days ago');
    });

    it('should describe future times', () => {
      expect(formatRelativeTime(ago(-5 * 60_000), now)).toBe('in 5 mins');
      expect(formatRelativeTime('2026-03-02T12:00:00.000Z', now)).toBe('in 1 day');
    });
  });

  describe('visual width', () => {
    const red = '\u001b[31mFAILED\u001b[39m';

    it('should ignore color codes', () => {
      expect(getVisualWidth(red)).toBe(6);
      expect(padEndVisual(red, 9)).toBe(`${red}   `);
      expect(padEndVisual(red, 3)).toBe(red);
    });
  });

  it('should upper-case task states', () => {
    expect(stripAnsi(formatTaskState('succeeded'))).toBe('SUCCEEDED');
  });

  describe('formatTask', () => {
    const task = createMockTask({
      id: 'task-0001',
      key: 'alpine:3.20',
      params: { imageName: 'alpine', tag: '3.20', allTags: false },
      state: 'running',
      cancelRequested: true,
      attemptCount: 2,
      maxAttempts: 3,
      progress: 40,
      currentStep: 'Pushing layers',
      lastError: 'docker push failed: TLS handshake timeout',
      logs: [{ timestamp: new Date('2026-03-01T12:00:00.000Z'), message: 'Attempt 2 started' }],
    });

    it('should describe state, attempts and progress', () => {
      const output = lines(formatTask(task));

      expect(output[1]).toBe('Task: task-0001');
      expect(output[2]).toBe('State: RUNNING (cancel requested)');
      expect(output[3]).toBe('Kind: push');
      expect(output[4]).toBe('Key: alpine:3.20');
      expect(output[5]).toBe('Attempts: 2/3');
      expect(output).toContain('Progress: 40% - Pushing layers');
      expect(output).toContain('Last error: docker push failed: TLS handshake timeout');
      expect(output).toContain('  imageName: alpine');
      expect(output).toContain('  allTags: false');
      expect(output).not.toContain('Logs:');
    });

    it('should list logs on request', () => {
      const output = lines(formatTask(task, true));

      expect(output).toContain('Logs:');
      expect(output).toContain('  2026-03-01T12:00:00.000Z Attempt 2 started');
    });

    it('should show executor output of finished tasks', () => {
      const finished = createMockTask({
        state: 'succeeded',
        progress: 100,
        currentStep: 'Completed',
        result: { success: true, output: { digest: 'sha256:0a1b2c', layers: 3 } },
      });
      const output = lines(formatTask(finished));

      expect(output).toContain('Progress: 100% - Completed');
      expect(output).toContain('Output:');
      expect(output).toContain('  digest: sha256:0a1b2c');
      expect(output).toContain('  layers: 3');
    });
  });

  describe('formatTaskList', () => {
    it('should say when there is nothing to list', () => {
      expect(stripAnsi(formatTaskList([]))).toBe('No tasks found');
    });

    it('should render one aligned row per task', () => {
      const tasks = [
        createMockTask({ id: 'abcdef12-0000-4000-8000-000000000000', key: 'alpine:latest' }),
        createMockTask({
          id: '12345678-0000-4000-8000-000000000000',
          kind: 'build',
          key: 'app:1',
          state: 'succeeded',
          attemptCount: 1,
          finishedAt: new Date(),
        }),
        createMockTask({
          id: 'fedcba98-0000-4000-8000-000000000000',
          key: 'alpine:edge',
          attemptCount: 1,
          nextAttemptAt: new Date(Date.now() + 125_000),
        }),
      ];

      const output = lines(formatTaskList(tasks));

      expect(output[1]).toBe('Tasks: (3)');
      expect(output[3]).toBe(['TASK ID ', 'KIND ', 'KEY'.padEnd(13), 'STATE'.padEnd(9), 'ATTEMPTS', 'WHEN'].join(' | '));
      expect(output[5]).toMatch(/^abcdef12 \| push {2}\| alpine:latest \| PENDING {3}\| 0\/3 {6}\| created \d+ secs? ago$/);
      expect(output[6]).toMatch(/^12345678 \| build \| app:1 {9}\| SUCCEEDED \| 1\/3 {6}\| finished \d+ secs? ago$/);
      expect(output[7]).toBe('fedcba98 | push  | alpine:edge   | PENDING   | 1/3      | retry in 2 mins');
    });

    it('should describe the page being shown', () => {
      const output = lines(formatTaskList([createMockTask()], {
        total: 25,
        offset: 10,
        limit: 10,
        rangeStart: 11,
        rangeEnd: 20,
        hasMore: true,
      }));

      expect(output[2]).toBe('Showing 11-20 of 25 tasks (more available)');
      expect(output[output.length - 1]).toBe('Page 2 of 3');
    });
  });

  describe('formatQueueStats', () => {
    const stats: QueueStats = {
      counts: { pending: 3, running: 1, succeeded: 5, failed: 1, cancelled: 0 },
      total: 10,
      concurrency: 2,
      busyWorkers: 1,
      paused: true,
      closed: false,
      lockedKeys: ['alpine:3.20'],
      runningTasks: [
        createMockTask({ id: 'abcdef12-0000', key: 'alpine:3.20', state: 'running', attemptCount: 2 }),
      ],
      recentTasks: [],
    };

    it('should summarize workers, keys and counts', () => {
      expect(lines(formatQueueStats(stats))).toEqual([
        '',
        'Queue: PAUSED',
        'Workers: 1/2 busy',
        'Locked keys: alpine:3.20',
        '',
        'Tasks: 10',
        '  Pending: 3',
        '  Running: 1',
        '  Succeeded: 5',
        '  Failed: 1',
        '  Cancelled: 0',
        '',
        'Running:',
        '  abcdef12 push alpine:3.20 (attempt 2/3)',
        '',
      ]);
    });

    it('should report a closed queue with no locked keys', () => {
      const output = lines(formatQueueStats({ ...stats, closed: true, lockedKeys: [], runningTasks: [] }));

      expect(output[1]).toBe('Queue: CLOSED');
      expect(output[3]).toBe('Locked keys: none');
      expect(output).not.toContain('Running:');
    });
  });

  describe('formatCommandResult', () => {
    const body = () => 'body';

    it('should print JSON with an exit code', () => {
      expect(formatCommandResult({ success: true, data: { removed: 2 } }, 'json', body)).toEqual({
        text: JSON.stringify({ success: true, data: { removed: 2 } }, null, 2),
        exitCode: 0,
      });
      expect(formatCommandResult({ success: false, error: 'nope' }, 'json', body).exitCode).toBe(1);
    });

    it('should print human errors with their code', () => {
      const failed = formatCommandResult({ success: false, error: 'Task x not found', errorCode: 'NOT_FOUND' }, 'human', body);

      expect(stripAnsi(failed.text)).toBe('Error: Task x not found [NOT_FOUND]');
      expect(failed.exitCode).toBe(1);
      expect(stripAnsi(formatCommandResult({ success: false }, 'human', body).text)).toBe('Error: Command failed');
    });

    it('should print the message above the formatted body', () => {
      const done = formatCommandResult({ success: true, message: 'Task t1 queued' }, 'human', () => '\nTask: t1\n');

      expect(stripAnsi(done.text)).toBe('Task t1 queued\n\nTask: t1');
      expect(done.exitCode).toBe(0);
    });
  });
});
