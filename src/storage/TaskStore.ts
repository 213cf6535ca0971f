import {
  Task,
  TaskCreateInput,
  TaskFilters,
  TaskState,
  TaskUpdateInput,
} from '../types/index.js';
import { NotFoundError } from '../utils/errors.js';

/**
 * Task store interface.
 * Every mutation is atomic per task; readers receive snapshots and never see
 * a partially applied update.
 */
export interface TaskStore {
  // Lifecycle
  initialize(): Promise<void>;
  close(): Promise<void>;

  createTask(input: TaskCreateInput): Promise<Task>;
  getTask(taskId: string): Promise<Task | null>;
  updateTask(taskId: string, input: TaskUpdateInput): Promise<Task>;
  /**
   * Compare-and-set on state: applies `input` only while the task is in one
   * of `from`. Resolves null when the task is gone or in another state.
   */
  transitionTask(taskId: string, from: readonly TaskState[], input: TaskUpdateInput): Promise<Task | null>;
  appendTaskLog(taskId: string, message: string): Promise<void>;
  listTasks(filters?: TaskFilters): Promise<Task[]>;
  listKeys(): Promise<string[]>;
  deleteTask(taskId: string): Promise<boolean>;
  deleteFinishedTasks(finishedBefore?: Date): Promise<string[]>;
  countByState(): Promise<Record<TaskState, number>>;

  // Health check
  healthCheck(): Promise<{ healthy: boolean; message?: string }>;
}

/**
 * Base class with common initialization bookkeeping
 */
export abstract class BaseTaskStore implements TaskStore {
  protected initialized = false;

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.doInitialize();
    this.initialized = true;
  }

  async close(): Promise<void> {
    if (!this.initialized) {
      return;
    }
    await this.doClose();
    this.initialized = false;
  }

  async updateTask(taskId: string, input: TaskUpdateInput): Promise<Task> {
    const task = await this.applyUpdate(taskId, input);
    if (!task) {
      throw new NotFoundError(`Task ${taskId} not found`);
    }
    return task;
  }

  async transitionTask(taskId: string, from: readonly TaskState[], input: TaskUpdateInput): Promise<Task | null> {
    return this.applyUpdate(taskId, input, from);
  }

  protected ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('Task store not initialized. Call initialize() first.');
    }
  }

  // Abstract methods that implementations must provide
  protected abstract doInitialize(): Promise<void>;
  protected abstract doClose(): Promise<void>;
  protected abstract applyUpdate(
    taskId: string,
    input: TaskUpdateInput,
    from?: readonly TaskState[]
  ): Promise<Task | null>;

  abstract createTask(input: TaskCreateInput): Promise<Task>;
  abstract getTask(taskId: string): Promise<Task | null>;
  abstract appendTaskLog(taskId: string, message: string): Promise<void>;
  abstract listTasks(filters?: TaskFilters): Promise<Task[]>;
  abstract listKeys(): Promise<string[]>;
  abstract deleteTask(taskId: string): Promise<boolean>;
  abstract deleteFinishedTasks(finishedBefore?: Date): Promise<string[]>;
  abstract countByState(): Promise<Record<TaskState, number>>;
  abstract healthCheck(): Promise<{ healthy: boolean; message?: string }>;
}
