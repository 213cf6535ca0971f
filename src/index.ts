#!/usr/bin/env node

/**
 * opsqueue
 * Main entry point - determines whether to run as MCP server, HTTP server or CLI tool
 */

import { parseArgs } from 'node:util';
import { readFileSync } from 'node:fs';

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return 'unknown';
}

// Drop --mode (either form) before handing the rest to the CLI
function stripModeArgs(args: string[]): string[] {
  const rest: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg === '--mode') {
      i++;
      continue;
    }
    if (!arg.startsWith('--mode=')) {
      rest.push(arg);
    }
  }
  return rest;
}

async function main() {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    allowPositionals: true,
    strict: false,
    options: {
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
      mode: { type: 'string' },
    },
  });

  if (values.help && positionals.length === 0) {
    console.log(`
opsqueue - keyed task queue for long-running container operations

Usage:
  opsqueue [options] [command]

Options:
  -h, --help     Show this help message
  -v, --version  Show version
  --mode <mode>  Run mode: 'mcp', 'http', or 'cli' (default: OPSQUEUE_MODE or mcp)

MCP Mode:
  Serves submit/get_status/cancel and the admin tools over stdio

HTTP Mode:
  Serves the same operations as a REST API

CLI Mode:
  Inspects the task store (get-status, list-status, queue-stats, health-check)

Examples:
  opsqueue                              # Run as MCP server
  opsqueue --mode=http                  # Run as HTTP server
  opsqueue list-status --state pending  # Run CLI command
`);
    return;
  }

  if (values.version) {
    console.log(`opsqueue v${readVersion()}`);
    return;
  }

  const mode = typeof values.mode === 'string' ? values.mode : process.env.OPSQUEUE_MODE;

  if (mode === 'cli' || positionals.length > 0) {
    const { runCLI } = await import('./cli.js');
    await runCLI(stripModeArgs(process.argv.slice(2)));
  } else if (mode === 'http') {
    const { runHttpServer } = await import('./http.js');
    await runHttpServer();
  } else {
    const { runMCPServer } = await import('./mcp.js');
    await runMCPServer();
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error);
  process.exit(1);
});
