import path from 'path';
import lockfile from 'proper-lockfile';
import {
  Task,
  TaskCreateInput,
  TaskFilters,
  TaskState,
  TaskUpdateInput,
} from '../types/index.js';
import { BaseTaskStore } from './TaskStore.js';
import { StoredTaskFile, TaskIndex } from './TaskIndex.js';
import { ensureDirectory, readFileSafe, writeFileAtomic } from '../utils/fileUtils.js';
import { logger } from '../utils/logger.js';

const TASKS_FILE = 'tasks.json';

function isStoredTaskFile(data: unknown): data is StoredTaskFile {
  return (
    typeof data === 'object' &&
    data !== null &&
    'version' in data &&
    data.version === 1 &&
    'tasks' in data &&
    Array.isArray(data.tasks) &&
    'nextSequence' in data &&
    typeof data.nextSequence === 'number'
  );
}

/**
 * File-based task store.
 * All tasks live in one JSON document guarded by an in-process lock plus a
 * proper-lockfile lock, so several processes may share a data directory.
 * Writes go through temp file + rename.
 */
export class FileTaskStore extends BaseTaskStore {
  private readonly dataDir: string;
  private readonly lockTimeout: number;
  private memoryLock: Promise<void> | null = null;

  constructor(dataDir: string, lockTimeout: number = 30000) {
    super();
    this.dataDir = dataDir;
    this.lockTimeout = lockTimeout;
  }

  protected async doInitialize(): Promise<void> {
    await ensureDirectory(this.dataDir);

    // proper-lockfile needs the target to exist
    const existing = await readFileSafe(this.filePath);
    if (existing === null) {
      await writeFileAtomic(this.filePath, JSON.stringify(new TaskIndex().toJSON(), null, 2));
    }

    const index = await this.readIndex();
    logger.debug('File task store initialized', {
      operation: 'initialize',
      dataDir: this.dataDir,
      tasks: index.size,
    });
  }

  protected async doClose(): Promise<void> {
    // Wait for any in-flight write to finish
    while (this.memoryLock) {
      await this.memoryLock;
    }
  }

  private get filePath(): string {
    return path.join(this.dataDir, TASKS_FILE);
  }

  /**
   * Read-modify-write under both locks
   */
  private async withStoreLock<T>(operation: (index: TaskIndex) => T): Promise<T> {
    this.ensureInitialized();

    // FIRST: in-memory lock serializes writers in this process
    while (this.memoryLock) {
      logger.trace('Waiting for in-memory lock', { operation: 'withStoreLock' });
      await this.memoryLock;
    }

    let releaseMemoryLock = (): void => undefined;
    this.memoryLock = new Promise<void>(resolve => {
      releaseMemoryLock = resolve;
    });

    try {
      // SECOND: file lock guards against other processes
      const lockStart = Date.now();
      const release = await lockfile.lock(this.filePath, {
        retries: {
          retries: 50,
          minTimeout: 5,
          maxTimeout: 200,
          factor: 1.1,
        },
        stale: this.lockTimeout,
      });
      logger.trace('File lock acquired', { operation: 'withStoreLock', duration: Date.now() - lockStart });

      try {
        const index = await this.readIndex();
        const result = operation(index);
        await this.writeIndex(index);
        return result;
      } finally {
        await release();
      }
    } finally {
      this.memoryLock = null;
      releaseMemoryLock();
    }
  }

  private async readIndex(): Promise<TaskIndex> {
    const content = await readFileSafe(this.filePath);
    if (!content) {
      return new TaskIndex();
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new Error(`Failed to parse task data in ${this.filePath}: ${String(error)}`);
    }

    if (!isStoredTaskFile(data)) {
      throw new Error(`Unrecognized task data format in ${this.filePath}`);
    }
    return TaskIndex.fromJSON(data);
  }

  private async writeIndex(index: TaskIndex): Promise<void> {
    await writeFileAtomic(this.filePath, JSON.stringify(index.toJSON(), null, 2));
    logger.trace('Task data written', { operation: 'writeIndex', tasks: index.size });
  }

  protected async applyUpdate(
    taskId: string,
    input: TaskUpdateInput,
    from?: readonly TaskState[]
  ): Promise<Task | null> {
    return this.withStoreLock(index => index.update(taskId, input, from));
  }

  async createTask(input: TaskCreateInput): Promise<Task> {
    return this.withStoreLock(index => index.create(input));
  }

  async getTask(taskId: string): Promise<Task | null> {
    this.ensureInitialized();
    const index = await this.readIndex();
    return index.get(taskId);
  }

  async appendTaskLog(taskId: string, message: string): Promise<void> {
    await this.withStoreLock(index => index.appendLog(taskId, message));
  }

  async listTasks(filters?: TaskFilters): Promise<Task[]> {
    this.ensureInitialized();
    const index = await this.readIndex();
    return index.list(filters);
  }

  async listKeys(): Promise<string[]> {
    this.ensureInitialized();
    const index = await this.readIndex();
    return index.keys();
  }

  async deleteTask(taskId: string): Promise<boolean> {
    return this.withStoreLock(index => index.delete(taskId));
  }

  async deleteFinishedTasks(finishedBefore?: Date): Promise<string[]> {
    return this.withStoreLock(index => index.deleteFinished(finishedBefore));
  }

  async countByState(): Promise<Record<TaskState, number>> {
    this.ensureInitialized();
    const index = await this.readIndex();
    return index.countByState();
  }

  async healthCheck(): Promise<{ healthy: boolean; message?: string }> {
    if (!this.initialized) {
      return { healthy: false, message: 'File storage not initialized' };
    }
    try {
      await this.readIndex();
      return { healthy: true, message: 'File storage is healthy' };
    } catch (error) {
      return { healthy: false, message: error instanceof Error ? error.message : String(error) };
    }
  }
}
