/**
 * Types for unified command definition system
 */

import type { QueueManager } from '../services/QueueManager.js';
import type { TaskStore } from '../storage/TaskStore.js';

type CamelToSnakeCase<S extends string> = S extends `${infer T}${infer U}` ?
  `${T extends Capitalize<T> ? "_" : ""}${Lowercase<T>}${CamelToSnakeCase<U>}` :
  S;
type CamelToKebabCase<S extends string> = S extends `${infer T}${infer U}` ?
  `${T extends Capitalize<T> ? "-" : ""}${Lowercase<T>}${CamelToKebabCase<U>}` :
  S;

export type PromisedReturnType<T extends (...args: never[]) => unknown> = Awaited<ReturnType<T>>;

// Service context for command handlers
export interface ServiceContext {
  queue: QueueManager;
  store: TaskStore;
}

type CommandParameterTypes = 'string' | 'number' | 'boolean' | 'object';
// Parameter definition for commands with type inference support
export interface CommandParameter<T extends CommandParameterTypes = CommandParameterTypes> {
  readonly name: string;
  readonly type: T;
  readonly description: string;
  readonly required?: boolean;
  readonly default?: ParameterFromName<T>;
  readonly choices?: readonly string[];
  readonly alias?: string | readonly string[];
  readonly positional?: boolean;
}

type ParameterFromName<T extends CommandParameterTypes> =
  T extends 'string' ? string :
  T extends 'number' ? number :
  T extends 'boolean' ? boolean :
  T extends 'object' ? Record<string, unknown> :
  never;

// Type inference magic - extract argument types from parameter definitions
type ParameterType<T extends CommandParameter> =
  T['type'] extends 'string' ?
    T['choices'] extends readonly string[] ? T['choices'][number] : string :
  T['type'] extends 'number' ? number :
  T['type'] extends 'boolean' ? boolean :
  T['type'] extends 'object' ? Record<string, unknown> :
  never;

type ParameterValue<T extends CommandParameter> =
  T['required'] extends true ? ParameterType<T> :
  T['default'] extends undefined ? ParameterType<T> | undefined :
  ParameterType<T>;

// Convert parameter array to argument object type
export type InferArgs<T extends readonly CommandParameter[]> = {
  [K in T[number] as K['name']]: ParameterValue<K>
};

// Command definition interface with type inference
export interface CommandDefinition<T extends readonly CommandParameter[] = readonly CommandParameter[], R extends CommandResult<unknown> = CommandResult<unknown>, NAME extends string = string> {
  // Identity
  name: NAME;
  mcpName: CamelToSnakeCase<NAME>;      // MCP tool name (with underscores)
  cliName: CamelToKebabCase<NAME>;      // CLI command name (with dashes)
  description: string;

  // Parameters
  parameters: T;

  // Return data type for formatters
  returnDataType: 'single' | 'list' | 'stats' | 'health' | 'generic';

  // Read-only commands are also exposed on the CLI
  readOnly?: boolean;

  // Handler function with inferred argument types
  handler(context: ServiceContext, args: InferArgs<T>): Promise<R>;

  // Formatting functions for CLI output
  formatResult(result: R, args: InferArgs<T>): string;

  // Optional metadata
  examples?: string[];
  notes?: string;

  // Enhanced discoverability metadata for LLM agents
  discoverability?: ToolDiscoverability;
}

// Generic function to define commands with full type inference
export function defineCommand<T extends readonly CommandParameter[], R extends CommandResult<unknown>, NAME extends string>(
  definition: CommandDefinition<T, R, NAME>
): CommandDefinition<T, R, NAME> {
  return definition;
}

export interface PaginationInfo {
  total: number;
  offset: number;
  limit: number;
  rangeStart: number;
  rangeEnd: number;
  hasMore: boolean;
}

// Result format for consistent output
export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  errorCode?: string;
  message?: string;
  pagination?: PaginationInfo;
}

export type CommandTypes<T extends CommandDefinition> = {
  name: T['name'];
  mcpName: T['mcpName'];
  cliName: T['cliName'];
  args: InferArgs<T['parameters']>;
  returnType: PromisedReturnType<T['handler']>;
  def: T;
}

// Enhanced discoverability metadata for LLM agents
export interface ToolDiscoverability {
  /** Keywords that should trigger consideration of this tool */
  triggerKeywords: string[];
  /** When to use this tool (context and conditions) */
  useWhen: string[];
  /** What typically comes before this tool in workflows */
  typicalPredecessors: string[];
  /** What typically comes after this tool in workflows */
  typicalSuccessors: string[];
  /** What the tool returns and how to interpret results */
  expectedOutcomes: string[];
  /** Anti-patterns - when NOT to use this tool */
  antiPatterns: string[];
}
