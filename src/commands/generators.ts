/**
 * Generators for MCP tools and CLI commands from command definitions
 */

import Joi from 'joi';
import type { Argv, Options, PositionalOptions } from 'yargs';
import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { formatCommandResult, OutputFormat } from './formatters.js';
import type { GenericCommandDefinition } from './index.js';
import type { CommandParameter, CommandResult, InferArgs, ServiceContext } from './types.js';
import { parseJsonObject } from './utils.js';
import { validate } from '../utils/validation.js';
import { isQueueError } from '../utils/errors.js';
import { getErrorMessage } from '../types/index.js';
import { logger } from '../utils/logger.js';

function logUnexpectedError(error: unknown, context: string): void {
  logger.error(`Unexpected error in ${context}`, {}, error);
}

// Type definitions for CLI and MCP args
export interface CliArgs {
  [key: string]: unknown;
  format?: unknown;
}

export interface McpArgs {
  [key: string]: unknown;
  format?: unknown;
}

interface JsonSchemaProperty {
  type: 'string' | 'number' | 'boolean' | 'object';
  description: string;
  enum?: readonly string[];
  default?: unknown;
}

function toOutputFormat(value: unknown, fallback: OutputFormat): OutputFormat {
  return value === 'human' || value === 'json' ? value : fallback;
}

function parameterSchema(param: CommandParameter): Joi.AnySchema {
  let schema: Joi.AnySchema;
  switch (param.type) {
    case 'string':
      schema = param.choices ? Joi.string().valid(...param.choices) : Joi.string();
      break;
    case 'number':
      schema = Joi.number();
      break;
    case 'boolean':
      schema = Joi.boolean();
      break;
    case 'object':
    default:
      schema = Joi.object().unknown(true);
      break;
  }

  if (param.required) {
    schema = schema.required();
  }
  if (param.default !== undefined) {
    schema = schema.default(param.default);
  }
  return schema;
}

/**
 * Validate raw arguments against a command's parameter list, applying defaults.
 * Object parameters may arrive as JSON strings (CLI, some MCP clients).
 */
export function validateCommandArgs<T extends readonly CommandParameter[]>(
  parameters: T,
  rawArgs: Record<string, unknown>
): InferArgs<T> {
  const keys: Record<string, Joi.Schema> = {};
  const input: Record<string, unknown> = { ...rawArgs };

  for (const param of parameters) {
    keys[param.name] = parameterSchema(param);
    const value = input[param.name];
    if (param.type === 'object' && typeof value === 'string') {
      input[param.name] = parseJsonObject(value, param.name);
    }
  }

  return validate(Joi.object<InferArgs<T>, false, Record<string, unknown>>(keys), input);
}

/**
 * Run a command and fold thrown errors into a failed result
 */
export async function executeCommand(
  def: GenericCommandDefinition,
  context: ServiceContext,
  rawArgs: Record<string, unknown>,
  source: string
): Promise<{ result: CommandResult<unknown>; args?: InferArgs<GenericCommandDefinition['parameters']> }> {
  let args: InferArgs<GenericCommandDefinition['parameters']> | undefined;
  try {
    args = validateCommandArgs(def.parameters, rawArgs);
    const result = await def.handler(context, args);
    return { result, args };
  } catch (error: unknown) {
    if (!isQueueError(error)) {
      logUnexpectedError(error, `${source} ${def.name}`);
    }
    return {
      result: {
        success: false,
        error: getErrorMessage(error),
        errorCode: isQueueError(error) ? error.code : 'INTERNAL_ERROR',
      },
      args,
    };
  }
}

function renderResult(
  def: GenericCommandDefinition,
  result: CommandResult<unknown>,
  args: InferArgs<GenericCommandDefinition['parameters']> | undefined,
  format: OutputFormat
) {
  return formatCommandResult(result, format, r => (args ? def.formatResult(r, args) : ''));
}

/**
 * Generate MCP tool from command definition
 */
export function generateMcpTool(def: GenericCommandDefinition): Tool {
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: string[] = [];

  // Add format parameter to all MCP tools
  properties.format = {
    type: 'string',
    description: 'Output format (human-readable text or JSON)',
    enum: ['human', 'json'],
    default: 'json',
  };

  for (const param of def.parameters) {
    const schema: JsonSchemaProperty = {
      type: param.type,
      description: param.description,
    };

    if (param.choices) {
      schema.enum = param.choices;
    }
    if (param.default !== undefined) {
      schema.default = param.default;
    }

    properties[param.name] = schema;

    if (param.required) {
      required.push(param.name);
    }
  }

  return {
    name: def.mcpName,
    description: generateEnhancedDescription(def),
    inputSchema: {
      type: 'object',
      properties,
      required: required.length > 0 ? required : undefined,
      additionalProperties: false,
    },
  };
}

/**
 * Generate enhanced description with LLM agent discoverability hints
 */
function generateEnhancedDescription(def: GenericCommandDefinition): string {
  let description = def.description;

  if (def.discoverability) {
    const disc = def.discoverability;

    if (disc.triggerKeywords.length > 0) {
      description += `\n\nKEYWORDS: ${disc.triggerKeywords.join(', ')}`;
    }
    if (disc.useWhen.length > 0) {
      description += `\n\nUSE WHEN: ${disc.useWhen.join(' | ')}`;
    }
    if (disc.typicalPredecessors.length > 0) {
      description += `\n\nTYPICALLY AFTER: ${disc.typicalPredecessors.join(', ')}`;
    }
    if (disc.typicalSuccessors.length > 0) {
      description += `\n\nTYPICALLY BEFORE: ${disc.typicalSuccessors.join(', ')}`;
    }
    if (disc.expectedOutcomes.length > 0) {
      description += `\n\nRETURNS: ${disc.expectedOutcomes.join(' | ')}`;
    }
    if (disc.antiPatterns.length > 0) {
      description += `\n\nAVOID WHEN: ${disc.antiPatterns.join(' | ')}`;
    }
  }

  return description;
}

function yargsType(param: CommandParameter): 'string' | 'number' | 'boolean' {
  // Object parameters are passed as JSON (or @file.json) on the command line
  return param.type === 'object' ? 'string' : param.type;
}

/**
 * Generate CLI command configuration from command definition
 */
export function generateCliCommand(def: GenericCommandDefinition) {
  const positionalParams = def.parameters.filter(p => p.positional);
  const commandParts: string[] = [def.cliName];

  for (const param of positionalParams) {
    commandParts.push(param.required ? `<${param.name}>` : `[${param.name}]`);
  }

  const builder = (yargs: Argv): Argv => {
    let result: Argv = yargs.option('format', {
      type: 'string',
      describe: 'Output format',
      choices: ['human', 'json'],
      default: 'human',
      alias: 'f',
    });

    for (const param of def.parameters) {
      const defaultValue = param.type === 'object' ? undefined : param.default;
      if (param.positional) {
        const positional: PositionalOptions = {
          describe: param.description,
          type: yargsType(param),
          ...(defaultValue !== undefined && { default: defaultValue }),
          ...(param.choices && { choices: [...param.choices] }),
        };
        result = result.positional(param.name, positional);
      } else {
        const option: Options = {
          type: yargsType(param),
          describe: param.description,
          ...(param.alias && { alias: typeof param.alias === 'string' ? param.alias : [...param.alias] }),
          ...(defaultValue !== undefined && { default: defaultValue }),
          ...(param.choices && { choices: [...param.choices] }),
        };
        result = result.option(param.name, option);
      }
    }

    return result;
  };

  return {
    command: commandParts.join(' '),
    describe: def.description,
    builder,
  };
}

/**
 * Generate CLI handler from command definition.
 * Resolves to the process exit code.
 */
export function generateCliHandler(def: GenericCommandDefinition, context: ServiceContext) {
  return async (argv: CliArgs): Promise<number> => {
    const format = toOutputFormat(argv.format, 'human');

    // yargs adds aliases, kebab-case copies and its own keys; keep declared parameters only
    const rawArgs: Record<string, unknown> = {};
    for (const param of def.parameters) {
      if (argv[param.name] !== undefined) {
        rawArgs[param.name] = argv[param.name];
      }
    }

    const { result, args } = await executeCommand(def, context, rawArgs, 'CLI');
    const formatted = renderResult(def, result, args, format);

    if (formatted.text) {
      if (formatted.exitCode === 0) {
        console.log(formatted.text);
      } else {
        console.error(formatted.text);
      }
    }
    return formatted.exitCode;
  };
}

/**
 * Generate MCP handler from command definition
 */
export function generateMcpHandler(def: GenericCommandDefinition, context: ServiceContext) {
  return async (args: McpArgs): Promise<CallToolResult> => {
    // JSON is the default for MCP tools
    const format = toOutputFormat(args.format, 'json');

    const handlerArgs: Record<string, unknown> = { ...args };
    delete handlerArgs.format;

    const { result, args: validArgs } = await executeCommand(def, context, handlerArgs, 'MCP');
    const formatted = renderResult(def, result, validArgs, format);

    return {
      content: [
        {
          type: 'text' as const,
          text: formatted.text,
        },
      ],
      isError: !result.success,
    };
  };
}
