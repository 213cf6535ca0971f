import { v4 as uuidv4 } from 'uuid';
import {
  Task,
  TaskCreateInput,
  TaskFilters,
  TaskLogEntry,
  TaskState,
  TaskUpdateInput,
  isTerminalState,
} from '../types/index.js';

export const MAX_TASK_LOGS = 100;

const STATES: TaskState[] = ['pending', 'running', 'succeeded', 'failed', 'cancelled'];

/**
 * JSON shape of a task on disk; dates are ISO strings
 */
export interface StoredTask extends Omit<Task, 'createdAt' | 'startedAt' | 'finishedAt' | 'nextAttemptAt' | 'logs'> {
  createdAt: string;
  startedAt?: string;
  finishedAt?: string;
  nextAttemptAt?: string;
  logs: { timestamp: string; message: string }[];
}

export interface StoredTaskFile {
  version: 1;
  nextSequence: number;
  tasks: StoredTask[];
}

export function emptyStateCounts(): Record<TaskState, number> {
  return { pending: 0, running: 0, succeeded: 0, failed: 0, cancelled: 0 };
}

export function cloneTask(task: Task): Task {
  return structuredClone(task);
}

/**
 * Creation order: createdAt ascending, sequence breaks ties
 */
export function compareTasks(a: Task, b: Task): number {
  return a.createdAt.getTime() - b.createdAt.getTime() || a.sequence - b.sequence;
}

export function matchesFilters(task: Task, filters: TaskFilters): boolean {
  if (filters.state && task.state !== filters.state) return false;
  if (filters.key && task.key !== filters.key) return false;
  if (filters.kind && task.kind !== filters.kind) return false;
  return true;
}

function optionalDate(value?: string): Date | undefined {
  return value ? new Date(value) : undefined;
}

function serializeTask(task: Task): StoredTask {
  return {
    ...task,
    createdAt: task.createdAt.toISOString(),
    startedAt: task.startedAt?.toISOString(),
    finishedAt: task.finishedAt?.toISOString(),
    nextAttemptAt: task.nextAttemptAt?.toISOString(),
    logs: task.logs.map(entry => ({ timestamp: entry.timestamp.toISOString(), message: entry.message })),
  };
}

function deserializeTask(stored: StoredTask): Task {
  const task: Task = {
    ...stored,
    createdAt: new Date(stored.createdAt),
    startedAt: optionalDate(stored.startedAt),
    finishedAt: optionalDate(stored.finishedAt),
    nextAttemptAt: optionalDate(stored.nextAttemptAt),
    logs: stored.logs.map(entry => ({ timestamp: new Date(entry.timestamp), message: entry.message })),
  };
  // JSON drops undefined; keep the in-memory shape identical
  for (const field of ['startedAt', 'finishedAt', 'nextAttemptAt'] as const) {
    if (task[field] === undefined) delete task[field];
  }
  return task;
}

function applyUpdate(task: Task, input: TaskUpdateInput): void {
  if (input.state !== undefined) task.state = input.state;
  if (input.attemptCount !== undefined) task.attemptCount = input.attemptCount;
  if (input.cancelRequested !== undefined) task.cancelRequested = input.cancelRequested;
  if (input.startedAt !== undefined) task.startedAt = input.startedAt;
  if (input.finishedAt !== undefined) task.finishedAt = input.finishedAt;
  if (input.progress !== undefined) task.progress = input.progress;
  if (input.currentStep !== undefined) task.currentStep = input.currentStep;
  if (input.result !== undefined) task.result = structuredClone(input.result);

  if (input.nextAttemptAt === null) {
    delete task.nextAttemptAt;
  } else if (input.nextAttemptAt !== undefined) {
    task.nextAttemptAt = input.nextAttemptAt;
  }

  if (input.lastError === null) {
    delete task.lastError;
  } else if (input.lastError !== undefined) {
    task.lastError = input.lastError;
  }
}

/**
 * Task records keyed by id, with a secondary index by contention key.
 * Every read hands out a copy; records are only changed through this class.
 */
export class TaskIndex {
  private readonly tasks = new Map<string, Task>();
  private readonly byKey = new Map<string, Set<string>>();
  private nextSequence = 1;

  static fromJSON(data: StoredTaskFile): TaskIndex {
    const index = new TaskIndex();
    for (const stored of data.tasks) {
      index.insert(deserializeTask(stored));
    }
    index.nextSequence = Math.max(data.nextSequence, index.maxSequence() + 1);
    return index;
  }

  toJSON(): StoredTaskFile {
    return {
      version: 1,
      nextSequence: this.nextSequence,
      tasks: this.sorted().map(serializeTask),
    };
  }

  get size(): number {
    return this.tasks.size;
  }

  create(input: TaskCreateInput, now: Date = new Date()): Task {
    const task: Task = {
      id: uuidv4(),
      sequence: this.nextSequence++,
      key: input.key,
      kind: input.kind,
      params: structuredClone(input.params),
      state: 'pending',
      attemptCount: 0,
      maxAttempts: input.maxAttempts,
      cancelRequested: false,
      createdAt: now,
      progress: 0,
      logs: [],
    };
    this.insert(task);
    return cloneTask(task);
  }

  get(taskId: string): Task | null {
    const task = this.tasks.get(taskId);
    return task ? cloneTask(task) : null;
  }

  /**
   * Apply an update; when `from` is given the update only happens if the
   * task is currently in one of those states. Returns null when the task is
   * missing or the guard rejects.
   */
  update(taskId: string, input: TaskUpdateInput, from?: readonly TaskState[]): Task | null {
    const task = this.tasks.get(taskId);
    if (!task) return null;
    if (from && !from.includes(task.state)) return null;
    applyUpdate(task, input);
    return cloneTask(task);
  }

  appendLog(taskId: string, message: string, timestamp: Date = new Date()): boolean {
    const task = this.tasks.get(taskId);
    if (!task) return false;
    const entry: TaskLogEntry = { timestamp, message };
    task.logs.push(entry);
    if (task.logs.length > MAX_TASK_LOGS) {
      task.logs.splice(0, task.logs.length - MAX_TASK_LOGS);
    }
    return true;
  }

  list(filters: TaskFilters = {}): Task[] {
    // The key index narrows the scan when a key filter is given
    const candidates = filters.key !== undefined
      ? this.idsForKey(filters.key).flatMap(id => {
          const task = this.tasks.get(id);
          return task ? [task] : [];
        })
      : Array.from(this.tasks.values());

    const matching = candidates.filter(task => matchesFilters(task, filters)).sort(compareTasks);
    const offset = filters.offset ?? 0;
    const end = filters.limit !== undefined ? offset + filters.limit : undefined;
    return matching.slice(offset, end).map(cloneTask);
  }

  keys(): string[] {
    return Array.from(this.byKey.keys());
  }

  delete(taskId: string): boolean {
    const task = this.tasks.get(taskId);
    if (!task) return false;
    this.tasks.delete(taskId);
    const ids = this.byKey.get(task.key);
    ids?.delete(taskId);
    if (ids && ids.size === 0) this.byKey.delete(task.key);
    return true;
  }

  /**
   * Remove terminal tasks, optionally only those finished before `finishedBefore`
   */
  deleteFinished(finishedBefore?: Date): string[] {
    const removed: string[] = [];
    for (const task of Array.from(this.tasks.values())) {
      if (!isTerminalState(task.state)) continue;
      if (finishedBefore && (!task.finishedAt || task.finishedAt >= finishedBefore)) continue;
      this.delete(task.id);
      removed.push(task.id);
    }
    return removed;
  }

  countByState(): Record<TaskState, number> {
    const counts = emptyStateCounts();
    for (const task of this.tasks.values()) {
      counts[task.state]++;
    }
    return counts;
  }

  private insert(task: Task): void {
    if (!STATES.includes(task.state)) {
      throw new Error(`Task ${task.id} has unknown state ${String(task.state)}`);
    }
    this.tasks.set(task.id, task);
    const ids = this.byKey.get(task.key) ?? new Set<string>();
    ids.add(task.id);
    this.byKey.set(task.key, ids);
  }

  private idsForKey(key: string): string[] {
    return Array.from(this.byKey.get(key) ?? []);
  }

  private sorted(): Task[] {
    return Array.from(this.tasks.values()).sort(compareTasks);
  }

  private maxSequence(): number {
    let max = 0;
    for (const task of this.tasks.values()) {
      max = Math.max(max, task.sequence);
    }
    return max;
  }
}
