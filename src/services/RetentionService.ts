import type { TaskStore } from '../storage/index.js';
import { getErrorMessage } from '../types/index.js';
import { Logger, logger } from '../utils/logger.js';
import { metrics, QueueMetrics } from '../utils/metrics.js';

export interface RetentionOptions {
  retentionMinutes: number;
  reaperIntervalMinutes: number;
}

/**
 * Periodically evicts finished tasks older than the retention window
 */
export class RetentionService {
  private interval: NodeJS.Timeout | null = null;
  private readonly log: Logger;

  constructor(
    private readonly store: TaskStore,
    private readonly options: RetentionOptions,
    parentLogger: Logger = logger
  ) {
    this.log = parentLogger.child({ component: 'RetentionService' });
  }

  start(): void {
    this.stop();

    this.interval = setInterval(() => {
      this.reapExpiredTasks().catch((error: unknown) => {
        this.log.error('Retention sweep failed', {}, error);
      });
    }, this.options.reaperIntervalMinutes * 60 * 1000);
    this.interval.unref();

    this.log.info('Retention started', {
      retentionMinutes: this.options.retentionMinutes,
      intervalMinutes: this.options.reaperIntervalMinutes,
    });
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
      this.log.info('Retention stopped');
    }
  }

  isRunning(): boolean {
    return this.interval !== null;
  }

  /**
   * Evict terminal tasks finished before now - retentionMinutes
   */
  async reapExpiredTasks(now: Date = new Date()): Promise<{ reaped: number; errors: string[] }> {
    const cutoff = new Date(now.getTime() - this.options.retentionMinutes * 60 * 1000);
    const errors: string[] = [];
    let reaped = 0;

    try {
      const removed = await this.store.deleteFinishedTasks(cutoff);
      reaped = removed.length;
    } catch (error) {
      errors.push(`Failed to evict finished tasks: ${getErrorMessage(error)}`);
    }

    if (reaped > 0) {
      metrics.incrementCounter(QueueMetrics.tasksEvicted.name, {}, reaped);
      this.log.info('Evicted finished tasks', { reaped, cutoff: cutoff.toISOString() });
    }

    return { reaped, errors };
  }
}
