/**
 * Unified command definitions - all commands organized by category
 */

import { CommandDefinition, CommandParameter, CommandResult } from './types.js';

import {
  submit,
  queuePush,
  getStatus,
  listStatus,
  cancel,
  clearFinished,
  pauseQueue,
  resumeQueue,
  queueStats
} from './definitions/queue.js';

import type {
  SubmitTypes,
  QueuePushTypes,
  GetStatusTypes,
  ListStatusTypes,
  CancelTypes,
  ClearFinishedTypes,
  PauseQueueTypes,
  ResumeQueueTypes,
  QueueStatsTypes
} from './definitions/queue.js';

import { healthCheck } from './definitions/system.js';
import type { HealthCheckTypes } from './definitions/system.js';

// Export all command definitions organized by category
export const COMMAND_DEFINITIONS = [
  // Submission
  submit,
  queuePush,

  // Status
  getStatus,
  listStatus,

  // Control
  cancel,
  clearFinished,
  pauseQueue,
  resumeQueue,

  // System
  queueStats,
  healthCheck
] as const satisfies CommandDefinition[];

export type AllCommandTypes = SubmitTypes |
  QueuePushTypes |
  GetStatusTypes |
  ListStatusTypes |
  CancelTypes |
  ClearFinishedTypes |
  PauseQueueTypes |
  ResumeQueueTypes |
  QueueStatsTypes |
  HealthCheckTypes;

export type CommandDefinitions = AllCommandTypes['def'];
export type CommandNames = AllCommandTypes['name'] | AllCommandTypes['cliName'] | AllCommandTypes['mcpName'];
export type CommandBaseNames = AllCommandTypes['name'];
export type CommandCliNames = AllCommandTypes['cliName'];
export type CommandMcpNames = AllCommandTypes['mcpName'];

export type GenericCommandDefinition = CommandDefinition<readonly CommandParameter[], CommandResult<unknown>, CommandBaseNames>;

export type InferTypesFromName<T extends CommandNames> = AllCommandTypes & ({ name: T } | { cliName: T } | { mcpName: T });
export type InferCommandFromName<T extends CommandNames> = InferTypesFromName<T>['def'];
export type InferReturnTypeFromCommandName<T extends CommandNames> = InferTypesFromName<T>['returnType'];
export type InferArgsFromCommandName<T extends CommandNames> = InferTypesFromName<T>['args'];

export { createServiceContext } from './context.js';
export { formatCommandResult } from './formatters.js';
export type { OutputFormat, FormattedOutput } from './formatters.js';
export * from './types.js';
