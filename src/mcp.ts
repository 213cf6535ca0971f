#!/usr/bin/env node

/**
 * MCP server over stdio
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { loadConfig } from './config/index.js';
import { createQueueRuntime, QueueRuntime } from './runtime.js';
import { tools, GeneratedToolHandlers } from './tools/generated.js';
import { logger } from './utils/logger.js';

/**
 * Build the MCP server for a runtime without connecting a transport
 */
export function createMcpServer(runtime: QueueRuntime): Server {
  const toolHandlers = new GeneratedToolHandlers(runtime.context);

  const server = new Server(
    {
      name: 'opsqueue',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    return toolHandlers.handleToolCall(request);
  });

  return server;
}

export async function runMCPServer(): Promise<void> {
  // stdout carries JSON-RPC
  logger.useStderr();

  const config = loadConfig();
  logger.setLogLevel(config.logging.level);
  logger.info('Starting MCP server', { storage: config.storage.provider, concurrency: config.queue.concurrency });

  const runtime = createQueueRuntime(config);
  await runtime.start();

  const server = createMcpServer(runtime);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('MCP server is running', { tools: tools.length });

  const shutdown = async (signal: string) => {
    logger.info('Shutting down MCP server', { signal });
    try {
      await runtime.stop();
      await server.close();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', {}, error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

// Run directly if called as main module
if (import.meta.url === `file://${process.argv[1]}`) {
  runMCPServer().catch((error: unknown) => {
    logger.error('MCP server error', {}, error);
    process.exit(1);
  });
}
