import type Joi from 'joi';
import type { TaskKind, TaskParams } from '../types/index.js';

/**
 * Handed to an executor for one attempt
 */
export interface ExecutionContext {
  taskId: string;
  key: string;
  attempt: number;
  deadline: Date;
  // Aborted on timeout, cancellation or shutdown
  signal: AbortSignal;
  isCancelled(): boolean;
  reportProgress(progress: number, step?: string): void;
  log(message: string): void;
}

export type ExecutionOutcome =
  | { status: 'success'; output?: Record<string, unknown> }
  | { status: 'retryable'; reason: string }
  | { status: 'fatal'; reason: string };

export const Outcome = {
  success(output?: Record<string, unknown>): ExecutionOutcome {
    return { status: 'success', output };
  },
  retryable(reason: string): ExecutionOutcome {
    return { status: 'retryable', reason };
  },
  fatal(reason: string): ExecutionOutcome {
    return { status: 'fatal', reason };
  },
};

/**
 * Performs one kind of external operation.
 * Must tolerate being abandoned mid-call: the pool may stop waiting after a
 * timeout or cancellation and call again later.
 */
export interface TaskExecutor {
  readonly kind: TaskKind;
  readonly description: string;
  readonly paramsSchema: Joi.ObjectSchema;
  /**
   * Contention key for validated params, when the caller gives none
   */
  deriveKey?(params: TaskParams): string;
  execute(params: TaskParams, context: ExecutionContext): Promise<ExecutionOutcome>;
}
