/**
 * Queue Commands (submit, status, cancel, administration)
 */

import chalk from '../../utils/chalk.js';
import type { CancelOutcome, QueueStats, Task } from '../../types/index.js';
import { CommandParameter, CommandResult, CommandTypes, defineCommand } from '../types.js';
import { formatQueueStats, formatTask, formatTaskList, formatTaskState } from '../formatters.js';

function formatCancelOutcome(outcome: CancelOutcome): string {
  let output = `\n${chalk.bold('Task:')} ${outcome.task.id}\n`;
  switch (outcome.outcome) {
    case 'cancelled':
      output += `${chalk.gray('Outcome:')} ${chalk.green('cancelled')}\n`;
      break;
    case 'cancel_requested':
      output += `${chalk.gray('Outcome:')} ${chalk.yellow('cancel requested')} (task is running; it stops at its next checkpoint)\n`;
      break;
    case 'already_terminal':
      output += `${chalk.gray('Outcome:')} ${chalk.gray('already finished, nothing to cancel')}\n`;
      break;
  }
  output += `${chalk.gray('State:')} ${formatTaskState(outcome.task.state)}\n`;
  return output;
}

// Submit Command
const submitParams = [
  {
    name: 'kind',
    type: 'string',
    description: 'Operation kind to run',
    required: true,
    choices: ['push', 'pull', 'build'],
  },
  {
    name: 'key',
    type: 'string',
    description: 'Contention key; tasks sharing a key never run at the same time. Derived from params when omitted.',
  },
  {
    name: 'params',
    type: 'object',
    description: 'Operation parameters, e.g. {"imageName": "registry.example.com/team/app", "tag": "1.2.0"}',
    default: {},
  },
] as const satisfies CommandParameter[];

export const submit = defineCommand({
  name: 'submit',
  mcpName: 'submit',
  cliName: 'submit',
  description: 'Enqueue a long-running operation and return immediately with its task id. Tasks with the same key run one at a time in submission order; tasks with different keys run concurrently up to the worker limit.',
  parameters: submitParams,
  returnDataType: 'single',
  formatResult: (result: CommandResult<Task>) => {
    return result.data ? formatTask(result.data) : '';
  },
  discoverability: {
    triggerKeywords: ['submit', 'enqueue', 'queue', 'run', 'start', 'operation', 'task'],
    useWhen: ['An operation takes too long to wait for inline', 'Operations on the same target must not overlap'],
    typicalPredecessors: ['queue_stats'],
    typicalSuccessors: ['get_status', 'cancel'],
    expectedOutcomes: ['Pending task with its id and key'],
    antiPatterns: ['Polling get_status in a tight loop right after submitting'],
  },
  async handler(context, args) {
    const task = await context.queue.submit({
      kind: args.kind,
      key: args.key,
      params: args.params,
    });

    return {
      success: true,
      data: task,
      message: `Task ${task.id} queued`,
    } satisfies CommandResult<Task>;
  },
});

export type SubmitTypes = CommandTypes<typeof submit>;

// Queue Push Command
const queuePushParams = [
  {
    name: 'imageName',
    type: 'string',
    description: 'Image repository to push, e.g. registry.example.com/team/app',
    required: true,
    positional: true,
  },
  {
    name: 'tag',
    type: 'string',
    description: 'Tag to push',
    default: 'latest',
    alias: 't',
  },
  {
    name: 'allTags',
    type: 'boolean',
    description: 'Push every local tag of the repository',
    default: false,
  },
  {
    name: 'disableContentTrust',
    type: 'boolean',
    description: 'Skip image signing for this push',
    default: true,
  },
  {
    name: 'quiet',
    type: 'boolean',
    description: 'Suppress verbose push output',
    default: false,
  },
] as const satisfies CommandParameter[];

export const queuePush = defineCommand({
  name: 'queuePush',
  mcpName: 'queue_push',
  cliName: 'queue-push',
  description: 'Queue a docker image push. Pushes of the same image and tag are serialized; the task id is returned immediately.',
  parameters: queuePushParams,
  returnDataType: 'single',
  formatResult: (result: CommandResult<Task>) => {
    return result.data ? formatTask(result.data) : '';
  },
  examples: ['queue_push imageName=registry.example.com/team/app tag=1.2.0'],
  discoverability: {
    triggerKeywords: ['push', 'docker', 'image', 'registry', 'publish'],
    useWhen: ['An image has been built and must be uploaded to a registry'],
    typicalPredecessors: ['submit'],
    typicalSuccessors: ['get_status'],
    expectedOutcomes: ['Pending task keyed by imageName:tag; output carries the pushed digest once it succeeds'],
    antiPatterns: ['Pushing images that were never built locally'],
  },
  async handler(context, args) {
    const task = await context.queue.submit({
      kind: 'push',
      params: {
        imageName: args.imageName,
        tag: args.tag,
        allTags: args.allTags,
        disableContentTrust: args.disableContentTrust,
        quiet: args.quiet,
      },
    });

    return {
      success: true,
      data: task,
      message: `Push of ${task.key} queued as task ${task.id}`,
    } satisfies CommandResult<Task>;
  },
});

export type QueuePushTypes = CommandTypes<typeof queuePush>;

// Get Status Command
const getStatusParams = [
  {
    name: 'taskId',
    type: 'string',
    description: 'Task ID returned by submit',
    required: true,
    positional: true,
  },
  {
    name: 'includeLogs',
    type: 'boolean',
    description: 'Include the task log lines',
    default: false,
    alias: 'l',
  },
] as const satisfies CommandParameter[];

export const getStatus = defineCommand({
  name: 'getStatus',
  mcpName: 'get_status',
  cliName: 'get-status',
  description: 'Get the current state of a task: state, attempts, progress, last error and, once finished, its result.',
  parameters: getStatusParams,
  returnDataType: 'single',
  readOnly: true,
  formatResult: (result: CommandResult<Task>, args) => {
    return result.data ? formatTask(result.data, args.includeLogs) : '';
  },
  async handler(context, args) {
    const task = await context.queue.getStatus(args.taskId);
    const data: Task = args.includeLogs ? task : { ...task, logs: [] };

    return {
      success: true,
      data,
    } satisfies CommandResult<Task>;
  },
});

export type GetStatusTypes = CommandTypes<typeof getStatus>;

// List Status Command
const listStatusParams = [
  {
    name: 'state',
    type: 'string',
    description: 'Only tasks in this state',
    choices: ['pending', 'running', 'succeeded', 'failed', 'cancelled'],
    alias: 's',
  },
  {
    name: 'key',
    type: 'string',
    description: 'Only tasks with this contention key',
    alias: 'k',
  },
  {
    name: 'kind',
    type: 'string',
    description: 'Only tasks of this kind',
    choices: ['push', 'pull', 'build'],
  },
  {
    name: 'limit',
    type: 'number',
    description: 'Maximum number of tasks to return',
    default: 50,
  },
  {
    name: 'offset',
    type: 'number',
    description: 'Number of tasks to skip',
    default: 0,
  },
] as const satisfies CommandParameter[];

export const listStatus = defineCommand({
  name: 'listStatus',
  mcpName: 'list_status',
  cliName: 'list-status',
  description: 'List tasks in submission order, optionally filtered by state, key or kind.',
  parameters: listStatusParams,
  returnDataType: 'list',
  readOnly: true,
  formatResult: (result: CommandResult<Task[]>) => {
    return formatTaskList(result.data ?? [], result.pagination);
  },
  async handler(context, args) {
    const filters = { state: args.state, key: args.key, kind: args.kind };
    const total = (await context.queue.listStatus(filters)).length;
    const page = await context.queue.listStatus({ ...filters, limit: args.limit, offset: args.offset });
    const data = page.map(task => ({ ...task, logs: [] }));

    const pagination = {
      total,
      offset: args.offset,
      limit: args.limit,
      rangeStart: total > 0 && data.length > 0 ? args.offset + 1 : 0,
      rangeEnd: args.offset + data.length,
      hasMore: args.offset + data.length < total,
    };

    return {
      success: true,
      data,
      pagination,
      message: `Found ${data.length} tasks (${total} total)`,
    } satisfies CommandResult<Task[]>;
  },
});

export type ListStatusTypes = CommandTypes<typeof listStatus>;

// Cancel Command
const cancelParams = [
  {
    name: 'taskId',
    type: 'string',
    description: 'Task ID to cancel',
    required: true,
    positional: true,
  },
] as const satisfies CommandParameter[];

export const cancel = defineCommand({
  name: 'cancel',
  mcpName: 'cancel',
  cliName: 'cancel',
  description: 'Cancel a task. Pending tasks are cancelled immediately and never run; running tasks are asked to stop; finished tasks are left as they are.',
  parameters: cancelParams,
  returnDataType: 'single',
  formatResult: (result: CommandResult<CancelOutcome>) => {
    return result.data ? formatCancelOutcome(result.data) : '';
  },
  async handler(context, args) {
    const outcome = await context.queue.cancel(args.taskId);

    return {
      success: true,
      data: outcome,
      message: outcome.accepted ? `Cancellation of ${args.taskId} accepted` : `Task ${args.taskId} already finished`,
    } satisfies CommandResult<CancelOutcome>;
  },
});

export type CancelTypes = CommandTypes<typeof cancel>;

// Clear Finished Command
export const clearFinished = defineCommand({
  name: 'clearFinished',
  mcpName: 'clear_finished',
  cliName: 'clear-finished',
  description: 'Remove every succeeded, failed and cancelled task from the store now.',
  parameters: [] as const satisfies CommandParameter[],
  returnDataType: 'generic',
  formatResult: (result: CommandResult<{ removed: number }>) => {
    return `${chalk.gray('Removed:')} ${result.data?.removed ?? 0} tasks`;
  },
  async handler(context) {
    const removed = await context.queue.clearFinished();

    return {
      success: true,
      data: { removed },
    } satisfies CommandResult<{ removed: number }>;
  },
});

export type ClearFinishedTypes = CommandTypes<typeof clearFinished>;

// Pause / Resume Commands
export const pauseQueue = defineCommand({
  name: 'pauseQueue',
  mcpName: 'pause_queue',
  cliName: 'pause-queue',
  description: 'Stop starting new tasks. Running tasks continue; pending tasks stay queued and can still be cancelled.',
  parameters: [] as const satisfies CommandParameter[],
  returnDataType: 'generic',
  formatResult: () => chalk.yellow('Queue paused'),
  async handler(context) {
    context.queue.pause();
    return {
      success: true,
      data: { paused: true },
    } satisfies CommandResult<{ paused: boolean }>;
  },
});

export type PauseQueueTypes = CommandTypes<typeof pauseQueue>;

export const resumeQueue = defineCommand({
  name: 'resumeQueue',
  mcpName: 'resume_queue',
  cliName: 'resume-queue',
  description: 'Resume starting tasks after pause_queue.',
  parameters: [] as const satisfies CommandParameter[],
  returnDataType: 'generic',
  formatResult: () => chalk.green('Queue resumed'),
  async handler(context) {
    context.queue.resume();
    return {
      success: true,
      data: { paused: false },
    } satisfies CommandResult<{ paused: boolean }>;
  },
});

export type ResumeQueueTypes = CommandTypes<typeof resumeQueue>;

// Queue Stats Command
export const queueStats = defineCommand({
  name: 'queueStats',
  mcpName: 'queue_stats',
  cliName: 'queue-stats',
  description: 'Counts per state, busy workers, keys currently running and the most recent tasks.',
  parameters: [] as const satisfies CommandParameter[],
  returnDataType: 'stats',
  readOnly: true,
  formatResult: (result: CommandResult<QueueStats>) => {
    return result.data ? formatQueueStats(result.data) : '';
  },
  async handler(context) {
    const stats = await context.queue.getQueueStats();
    return {
      success: true,
      data: stats,
    } satisfies CommandResult<QueueStats>;
  },
});

export type QueueStatsTypes = CommandTypes<typeof queueStats>;
