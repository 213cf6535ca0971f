/**
 * Output formatters for CLI commands and human-format MCP results
 * Supports both human-readable and JSON formats
 */

import chalk from '../utils/chalk.js';
import type { QueueStats, Task, TaskState } from '../types/index.js';
import type { CommandResult, PaginationInfo } from './types.js';

export type OutputFormat = 'human' | 'json';

export interface FormattedOutput {
  text: string;
  exitCode: number;
}

/**
 * Format time as relative (e.g., "2 hours ago", "in 3 min")
 */
export function formatRelativeTime(date: string | Date, now: Date = new Date()): string {
  const diffMs = now.getTime() - new Date(date).getTime();
  const future = diffMs < 0;
  const seconds = Math.floor(Math.abs(diffMs) / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  let span: string;
  if (days > 0) {
    span = `${days} day${days > 1 ? 's' : ''}`;
  } else if (hours > 0) {
    span = `${hours} hour${hours > 1 ? 's' : ''}`;
  } else if (minutes > 0) {
    span = `${minutes} min${minutes > 1 ? 's' : ''}`;
  } else {
    span = `${seconds} sec${seconds !== 1 ? 's' : ''}`;
  }
  return future ? `in ${span}` : `${span} ago`;
}

/**
 * Strip ANSI color codes to get visual width
 */
export function getVisualWidth(text: string): number {
  return text.replace(/\u001b\[[0-9;]*m/g, '').length;
}

/**
 * Pad text to width, accounting for ANSI color codes
 */
export function padEndVisual(text: string, width: number): string {
  const padding = Math.max(0, width - getVisualWidth(text));
  return text + ' '.repeat(padding);
}

/**
 * Format task state with colors
 */
export function formatTaskState(state: TaskState): string {
  const colors: Record<TaskState, (text: string) => string> = {
    pending: chalk.yellow,
    running: chalk.blue,
    succeeded: chalk.green,
    failed: chalk.red,
    cancelled: chalk.gray,
  };
  return colors[state](state.toUpperCase());
}

export function formatTask(task: Task, includeLogs = false): string {
  let output = `\n${chalk.bold('Task:')} ${task.id}\n`;
  output += `${chalk.gray('State:')} ${formatTaskState(task.state)}`;
  if (task.cancelRequested && task.state === 'running') {
    output += chalk.yellow(' (cancel requested)');
  }
  output += '\n';
  output += `${chalk.gray('Kind:')} ${task.kind}\n`;
  output += `${chalk.gray('Key:')} ${task.key}\n`;
  output += `${chalk.gray('Attempts:')} ${task.attemptCount}/${task.maxAttempts}\n`;
  output += `${chalk.gray('Created:')} ${new Date(task.createdAt).toLocaleString()}\n`;

  if (task.startedAt) {
    output += `${chalk.gray('Started:')} ${new Date(task.startedAt).toLocaleString()}\n`;
  }
  if (task.finishedAt) {
    output += `${chalk.gray('Finished:')} ${new Date(task.finishedAt).toLocaleString()}\n`;
  }
  if (task.nextAttemptAt) {
    output += `${chalk.gray('Next attempt:')} ${formatRelativeTime(task.nextAttemptAt)}\n`;
  }
  if (task.state === 'running' || task.progress > 0) {
    output += `${chalk.gray('Progress:')} ${task.progress}%${task.currentStep ? ` - ${task.currentStep}` : ''}\n`;
  }
  if (task.lastError) {
    output += `${chalk.gray('Last error:')} ${chalk.red(task.lastError)}\n`;
  }

  const paramEntries = Object.entries(task.params);
  if (paramEntries.length > 0) {
    output += `\n${chalk.bold('Params:')}\n`;
    for (const [key, value] of paramEntries) {
      output += `  ${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}\n`;
    }
  }

  if (task.result?.output && Object.keys(task.result.output).length > 0) {
    output += `\n${chalk.bold('Output:')}\n`;
    for (const [key, value] of Object.entries(task.result.output)) {
      output += `  ${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}\n`;
    }
  }

  if (includeLogs && task.logs.length > 0) {
    output += `\n${chalk.bold('Logs:')}\n`;
    for (const entry of task.logs) {
      output += `  ${chalk.gray(new Date(entry.timestamp).toISOString())} ${entry.message}\n`;
    }
  }

  return output;
}

function formatTaskTiming(task: Task): string {
  if (task.state === 'pending' && task.nextAttemptAt) {
    return chalk.yellow(`retry ${formatRelativeTime(task.nextAttemptAt)}`);
  }
  if (task.state === 'running' && task.startedAt) {
    return chalk.blue(`started ${formatRelativeTime(task.startedAt)}`);
  }
  if (task.finishedAt) {
    return chalk.gray(`finished ${formatRelativeTime(task.finishedAt)}`);
  }
  return chalk.gray(`created ${formatRelativeTime(task.createdAt)}`);
}

export function formatTaskList(tasks: Task[], pagination?: PaginationInfo): string {
  if (tasks.length === 0) {
    return chalk.gray('No tasks found');
  }

  let output = `\n${chalk.bold('Tasks:')} (${tasks.length})\n`;
  if (pagination) {
    output += chalk.gray(`Showing ${pagination.rangeStart}-${pagination.rangeEnd} of ${pagination.total} tasks`);
    if (pagination.hasMore) {
      output += chalk.gray(' (more available)');
    }
    output += '\n';
  }
  output += '\n';

  const ids = tasks.map(t => t.id.substring(0, 8));
  const keys = tasks.map(t => t.key);
  const timings = tasks.map(formatTaskTiming);

  const idWidth = Math.max(...ids.map(id => id.length), 'TASK ID'.length);
  const kindWidth = Math.max(...tasks.map(t => t.kind.length), 'KIND'.length);
  const keyWidth = Math.max(...keys.map(k => k.length), 'KEY'.length);
  const stateWidth = Math.max('SUCCEEDED'.length, 'STATE'.length);
  const attemptsWidth = 'ATTEMPTS'.length;

  output += chalk.bold(
    'TASK ID'.padEnd(idWidth) + ' | ' +
    'KIND'.padEnd(kindWidth) + ' | ' +
    'KEY'.padEnd(keyWidth) + ' | ' +
    'STATE'.padEnd(stateWidth) + ' | ' +
    'ATTEMPTS'.padEnd(attemptsWidth) + ' | ' +
    'WHEN'
  ) + '\n';
  output += chalk.gray('-'.repeat(idWidth + 3 + kindWidth + 3 + keyWidth + 3 + stateWidth + 3 + attemptsWidth + 3 + 4)) + '\n';

  tasks.forEach((task, i) => {
    output += (ids[i] ?? '').padEnd(idWidth) + ' | ' +
      task.kind.padEnd(kindWidth) + ' | ' +
      (keys[i] ?? '').padEnd(keyWidth) + ' | ' +
      padEndVisual(formatTaskState(task.state), stateWidth) + ' | ' +
      `${task.attemptCount}/${task.maxAttempts}`.padEnd(attemptsWidth) + ' | ' +
      (timings[i] ?? '') + '\n';
  });

  if (pagination && pagination.limit < pagination.total) {
    const currentPage = Math.floor(pagination.offset / pagination.limit) + 1;
    const totalPages = Math.ceil(pagination.total / pagination.limit);
    output += '\n' + chalk.gray(`Page ${currentPage} of ${totalPages}`);
  }

  return output;
}

export function formatQueueStats(stats: QueueStats): string {
  let output = `\n${chalk.bold('Queue:')} `;
  if (stats.closed) {
    output += chalk.red('CLOSED');
  } else if (stats.paused) {
    output += chalk.yellow('PAUSED');
  } else {
    output += chalk.green('RUNNING');
  }
  output += '\n';
  output += `${chalk.gray('Workers:')} ${stats.busyWorkers}/${stats.concurrency} busy\n`;
  output += `${chalk.gray('Locked keys:')} ${stats.lockedKeys.length > 0 ? stats.lockedKeys.join(', ') : 'none'}\n`;

  output += `\n${chalk.bold('Tasks:')} ${stats.total}\n`;
  output += `  Pending: ${chalk.yellow(stats.counts.pending)}\n`;
  output += `  Running: ${chalk.blue(stats.counts.running)}\n`;
  output += `  Succeeded: ${chalk.green(stats.counts.succeeded)}\n`;
  output += `  Failed: ${chalk.red(stats.counts.failed)}\n`;
  output += `  Cancelled: ${chalk.gray(stats.counts.cancelled)}\n`;

  if (stats.runningTasks.length > 0) {
    output += `\n${chalk.bold('Running:')}\n`;
    for (const task of stats.runningTasks) {
      output += `  ${task.id.substring(0, 8)} ${task.kind} ${task.key} (attempt ${task.attemptCount}/${task.maxAttempts})\n`;
    }
  }

  return output;
}

/**
 * Render a command result in the requested format
 */
export function formatCommandResult<R extends CommandResult<unknown>>(
  result: R,
  format: OutputFormat,
  formatSuccess: (result: R) => string
): FormattedOutput {
  if (format === 'json') {
    return {
      text: JSON.stringify(result, null, 2),
      exitCode: result.success ? 0 : 1,
    };
  }

  if (!result.success) {
    const code = result.errorCode ? ` [${result.errorCode}]` : '';
    return {
      text: `${chalk.red('Error:')} ${result.error || 'Command failed'}${code}`,
      exitCode: 1,
    };
  }

  let output = '';
  if (result.message) {
    output += chalk.green(result.message) + '\n';
  }
  output += formatSuccess(result);

  return {
    text: output.trim(),
    exitCode: 0,
  };
}
