import { TASK_KINDS } from '../types/index.js';
import type { TaskKind, TaskParams } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';
import { validate } from '../utils/validation.js';
import type { ExecutionContext, ExecutionOutcome, TaskExecutor } from './types.js';
import { Outcome } from './types.js';

export interface PreparedSubmission {
  kind: TaskKind;
  key: string;
  params: TaskParams;
}

function isTaskKind(kind: string): kind is TaskKind {
  return TASK_KINDS.some(known => known === kind);
}

/**
 * Maps task kinds to executors and implements
 * execute(kind, params, context) by dispatch.
 */
export class ExecutorRegistry {
  private readonly executors = new Map<TaskKind, TaskExecutor>();

  register(executor: TaskExecutor): this {
    this.executors.set(executor.kind, executor);
    return this;
  }

  has(kind: string): boolean {
    return isTaskKind(kind) && this.executors.has(kind);
  }

  kinds(): TaskKind[] {
    return Array.from(this.executors.keys());
  }

  get(kind: string): TaskExecutor {
    const executor = isTaskKind(kind) ? this.executors.get(kind) : undefined;
    if (!executor) {
      throw new ValidationError(
        `Unknown task kind "${kind}". Registered kinds: ${this.kinds().join(', ') || 'none'}`,
        [{ field: 'kind', message: 'unknown task kind', value: kind }]
      );
    }
    return executor;
  }

  /**
   * Validate params against the executor's schema and settle the key
   */
  prepare(kind: string, params: unknown, key?: string): PreparedSubmission {
    const executor = this.get(kind);
    const validParams: TaskParams = validate(executor.paramsSchema, params ?? {});
    const resolvedKey = key ?? executor.deriveKey?.(validParams);
    if (!resolvedKey) {
      throw new ValidationError(`A key is required for "${executor.kind}" tasks`, [
        { field: 'key', message: 'key is required' },
      ]);
    }
    return { kind: executor.kind, key: resolvedKey, params: validParams };
  }

  async execute(kind: TaskKind, params: TaskParams, context: ExecutionContext): Promise<ExecutionOutcome> {
    const executor = this.executors.get(kind);
    if (!executor) {
      return Outcome.fatal(`No executor registered for kind "${kind}"`);
    }
    return executor.execute(params, context);
  }
}
