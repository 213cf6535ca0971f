import { performance } from 'perf_hooks';

export type QueuePosition = 'head' | 'tail';

/**
 * Monotonic millisecond clock
 */
export type Clock = () => number;

export interface QueueEntry {
  id: string;
  key: string;
  sequence: number;
  // Monotonic time at which the entry becomes eligible (backoff)
  readyAt: number;
}

type Waiter = (entry: QueueEntry | null) => void;

/**
 * Pending work split into per-key FIFO buckets.
 *
 * Only the head of a bucket is eligible, and only while no other entry with
 * the same key is dispatched. Among eligible heads the lowest sequence wins.
 * A dispatched entry holds its key until release() is called.
 */
export class KeyedTaskQueue {
  private readonly buckets = new Map<string, QueueEntry[]>();
  private readonly lockedKeys = new Map<string, string>();
  private readonly dispatched = new Map<string, string>();
  private readonly waiters: Waiter[] = [];
  private wakeTimer: NodeJS.Timeout | null = null;
  private wakeAt = Infinity;
  private paused = false;
  private closed = false;

  constructor(private readonly clock: Clock = () => performance.now()) {}

  now(): number {
    return this.clock();
  }

  enqueue(entry: QueueEntry, position: QueuePosition = 'tail'): void {
    const bucket = this.buckets.get(entry.key) ?? [];
    if (position === 'head') {
      bucket.unshift(entry);
    } else {
      bucket.push(entry);
    }
    this.buckets.set(entry.key, bucket);
    this.dispatch();
  }

  /**
   * Remove a waiting entry. Dispatched entries are not affected.
   */
  remove(taskId: string): boolean {
    for (const [key, bucket] of this.buckets) {
      const index = bucket.findIndex(entry => entry.id === taskId);
      if (index === -1) continue;
      bucket.splice(index, 1);
      if (bucket.length === 0) this.buckets.delete(key);
      // A new head may now be eligible
      this.dispatch();
      return true;
    }
    return false;
  }

  has(taskId: string): boolean {
    for (const bucket of this.buckets.values()) {
      if (bucket.some(entry => entry.id === taskId)) return true;
    }
    return false;
  }

  isDispatched(taskId: string): boolean {
    return this.dispatched.has(taskId);
  }

  /**
   * Wait for the next eligible entry; resolves null once the queue is closed
   */
  acquire(): Promise<QueueEntry | null> {
    if (this.closed) {
      return Promise.resolve(null);
    }
    const entry = this.take();
    if (entry) {
      return Promise.resolve(entry);
    }
    return new Promise(resolve => {
      this.waiters.push(resolve);
      this.scheduleWake();
    });
  }

  /**
   * Give up the key held by a dispatched entry
   */
  release(entry: QueueEntry): void {
    if (this.lockedKeys.get(entry.key) === entry.id) {
      this.lockedKeys.delete(entry.key);
    }
    this.dispatched.delete(entry.id);
    this.dispatch();
  }

  pause(): void {
    this.paused = true;
    this.clearWake();
  }

  resume(): void {
    this.paused = false;
    this.dispatch();
  }

  isPaused(): boolean {
    return this.paused;
  }

  /**
   * Stop handing out work; every waiter resolves null
   */
  close(): void {
    this.closed = true;
    this.clearWake();
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    let total = 0;
    for (const bucket of this.buckets.values()) total += bucket.length;
    return total;
  }

  get waitingWorkers(): number {
    return this.waiters.length;
  }

  getLockedKeys(): string[] {
    return Array.from(this.lockedKeys.keys());
  }

  private take(): QueueEntry | null {
    if (this.paused || this.closed) return null;

    const now = this.clock();
    let best: QueueEntry | null = null;
    for (const [key, bucket] of this.buckets) {
      if (this.lockedKeys.has(key)) continue;
      const head = bucket[0];
      if (!head || head.readyAt > now) continue;
      if (!best || head.sequence < best.sequence) best = head;
    }
    if (!best) return null;

    const bucket = this.buckets.get(best.key);
    bucket?.shift();
    if (bucket && bucket.length === 0) this.buckets.delete(best.key);
    this.lockedKeys.set(best.key, best.id);
    this.dispatched.set(best.id, best.key);
    return best;
  }

  private dispatch(): void {
    while (this.waiters.length > 0) {
      const entry = this.take();
      if (!entry) break;
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(entry);
      }
    }
    this.scheduleWake();
  }

  /**
   * Arm a timer for the earliest backed-off head that idle workers could take
   */
  private scheduleWake(): void {
    if (this.waiters.length === 0 || this.paused || this.closed) {
      this.clearWake();
      return;
    }

    let earliest = Infinity;
    for (const [key, bucket] of this.buckets) {
      const head = bucket[0];
      if (!head || this.lockedKeys.has(key)) continue;
      earliest = Math.min(earliest, head.readyAt);
    }

    if (earliest === Infinity) {
      this.clearWake();
      return;
    }
    if (this.wakeTimer && this.wakeAt <= earliest) return;

    this.clearWake();
    this.wakeAt = earliest;
    this.wakeTimer = setTimeout(() => {
      this.wakeTimer = null;
      this.wakeAt = Infinity;
      this.dispatch();
    }, Math.max(0, Math.ceil(earliest - this.clock())));
  }

  private clearWake(): void {
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }
    this.wakeAt = Infinity;
  }
}
