export type TaskKind = 'push' | 'pull' | 'build';

export const TASK_KINDS: readonly TaskKind[] = ['push', 'pull', 'build'];

export type TaskState = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export const TERMINAL_STATES: readonly TaskState[] = ['succeeded', 'failed', 'cancelled'];

export function isTerminalState(state: TaskState): boolean {
  return TERMINAL_STATES.includes(state);
}

export type TaskParams = Record<string, unknown>;

export interface Task {
  id: string;
  sequence: number;  // Admission order, breaks createdAt ties
  key: string;  // Contention key, one running task per key
  kind: TaskKind;
  params: TaskParams;
  state: TaskState;
  attemptCount: number;
  maxAttempts: number;
  cancelRequested: boolean;
  createdAt: Date;
  startedAt?: Date;
  finishedAt?: Date;
  nextAttemptAt?: Date;  // Set while a retry is backing off
  lastError?: string;
  result?: TaskResult;  // Only on succeeded/failed
  progress: number;
  currentStep?: string;
  logs: TaskLogEntry[];
}

export type TaskFailureType = 'fatal' | 'retryable' | 'timeout';

export interface TaskResult {
  success: boolean;
  output?: Record<string, unknown>;
  error?: string;
  errorType?: TaskFailureType;
  duration?: number;
}

export interface TaskLogEntry {
  timestamp: Date;
  message: string;
}

export interface TaskCreateInput {
  kind: TaskKind;
  key: string;
  params: TaskParams;
  maxAttempts: number;
}

/**
 * A submission after shape validation, before the executor has checked params
 */
export interface TaskSubmission {
  kind: TaskKind;
  key?: string;
  params: TaskParams;
}

export interface TaskUpdateInput {
  state?: TaskState;
  attemptCount?: number;
  cancelRequested?: boolean;
  startedAt?: Date;
  finishedAt?: Date;
  nextAttemptAt?: Date | null;
  lastError?: string | null;
  result?: TaskResult;
  progress?: number;
  currentStep?: string;
}

export interface TaskFilters {
  state?: TaskState;
  key?: string;
  kind?: TaskKind;
  limit?: number;
  offset?: number;
}

export type CancelOutcomeKind = 'cancelled' | 'cancel_requested' | 'already_terminal';

export interface CancelOutcome {
  accepted: boolean;
  outcome: CancelOutcomeKind;
  finalState?: TaskState;
  task: Task;
}

export interface QueueStats {
  counts: Record<TaskState, number>;
  total: number;
  concurrency: number;
  busyWorkers: number;
  paused: boolean;
  closed: boolean;
  lockedKeys: string[];
  runningTasks: Task[];
  recentTasks: Task[];
}
