#!/usr/bin/env node

/**
 * opsqueue CLI - Generated from unified command definitions
 *
 * Read-only commands inspect the task store of a running (or stopped)
 * server; submission and control go through MCP or HTTP.
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import chalk from './utils/chalk.js';
import { loadConfig } from './config/index.js';
import { createQueueRuntime, QueueRuntime } from './runtime.js';
import { COMMAND_DEFINITIONS } from './commands/index.js';
import { generateCliCommand, generateCliHandler } from './commands/generators.js';
import { getErrorMessage } from './types/index.js';
import { logger } from './utils/logger.js';

let runtime: QueueRuntime | null = null;

async function initializeRuntime(): Promise<QueueRuntime> {
  if (runtime) return runtime;

  const config = loadConfig();
  // Keep stdout for command output
  logger.useStderr();
  logger.setLogLevel('warn');

  const created = createQueueRuntime(config);
  await created.queue.initialize();
  runtime = created;
  return created;
}

// Build CLI from command definitions
function buildCli(args: string[]) {
  let cli = yargs(args)
    .scriptName('opsqueue')
    .usage('$0 <command> [options]')
    .demandCommand(1, 'You need at least one command before moving on')
    .strict()
    .fail((msg, err) => {
      console.error(chalk.red('Error:'), err ? err.message : msg);
      if (!err) {
        console.error('\nRun --help to see available commands and options');
      }
      process.exit(1);
    })
    .help()
    .version()
    .alias('h', 'help');

  cli = cli.command('mcp', 'Run as MCP server for stdio transport', {}, async () => {
    const { runMCPServer } = await import('./mcp.js');
    await runMCPServer();
  });

  cli = cli.command('server', 'Run as HTTP REST API server', {}, async () => {
    const { runHttpServer } = await import('./http.js');
    await runHttpServer();
  });

  for (const def of COMMAND_DEFINITIONS) {
    if (!def.readOnly) continue;
    const commandConfig = generateCliCommand(def);

    cli = cli.command(
      commandConfig.command,
      commandConfig.describe,
      commandConfig.builder,
      async (argv) => {
        const rt = await initializeRuntime();
        try {
          const handler = generateCliHandler(def, rt.context);
          process.exitCode = await handler(argv);
        } finally {
          await rt.store.close();
        }
      }
    );
  }

  return cli;
}

// Export for programmatic use
export async function runCLI(args: string[] = hideBin(process.argv)): Promise<void> {
  await buildCli(args).parseAsync();
}

// Run when executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  runCLI().catch((error: unknown) => {
    console.error(chalk.red('CLI error:'), getErrorMessage(error));
    process.exit(1);
  });
}
