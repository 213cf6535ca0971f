import {
  Task,
  TaskCreateInput,
  TaskFilters,
  TaskState,
  TaskUpdateInput,
} from '../types/index.js';
import { BaseTaskStore } from './TaskStore.js';
import { TaskIndex } from './TaskIndex.js';

/**
 * Process-lifetime task store
 */
export class MemoryTaskStore extends BaseTaskStore {
  private index = new TaskIndex();

  protected async doInitialize(): Promise<void> {
    this.index = new TaskIndex();
  }

  protected async doClose(): Promise<void> {
    // Records live only as long as the process
  }

  protected async applyUpdate(
    taskId: string,
    input: TaskUpdateInput,
    from?: readonly TaskState[]
  ): Promise<Task | null> {
    this.ensureInitialized();
    return this.index.update(taskId, input, from);
  }

  async createTask(input: TaskCreateInput): Promise<Task> {
    this.ensureInitialized();
    return this.index.create(input);
  }

  async getTask(taskId: string): Promise<Task | null> {
    this.ensureInitialized();
    return this.index.get(taskId);
  }

  async appendTaskLog(taskId: string, message: string): Promise<void> {
    this.ensureInitialized();
    this.index.appendLog(taskId, message);
  }

  async listTasks(filters?: TaskFilters): Promise<Task[]> {
    this.ensureInitialized();
    return this.index.list(filters);
  }

  async listKeys(): Promise<string[]> {
    this.ensureInitialized();
    return this.index.keys();
  }

  async deleteTask(taskId: string): Promise<boolean> {
    this.ensureInitialized();
    return this.index.delete(taskId);
  }

  async deleteFinishedTasks(finishedBefore?: Date): Promise<string[]> {
    this.ensureInitialized();
    return this.index.deleteFinished(finishedBefore);
  }

  async countByState(): Promise<Record<TaskState, number>> {
    this.ensureInitialized();
    return this.index.countByState();
  }

  async healthCheck(): Promise<{ healthy: boolean; message?: string }> {
    return {
      healthy: this.initialized,
      message: this.initialized
        ? `Memory storage is healthy (${this.index.size} tasks)`
        : 'Memory storage not initialized',
    };
  }
}
