import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createMcpServer } from '../../src/mcp.js';
import { createQueueRuntime, QueueRuntime } from '../../src/runtime.js';
import { ExecutorRegistry } from '../../src/executors/registry.js';
import { ScriptedExecutor, createTestConfig } from '../fixtures/index.js';

describe('MCP server', () => {
  let runtime: QueueRuntime;
  let client: Client;

  beforeEach(async () => {
    runtime = createQueueRuntime(createTestConfig(), {
      executors: new ExecutorRegistry().register(new ScriptedExecutor('build')),
    });
    await runtime.start();

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await createMcpServer(runtime).connect(serverTransport);
    client = new Client({ name: 'test-client', version: '1.0.0' });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await runtime.stop();
  });

  it('should list the generated tools', async () => {
    const { tools } = await client.listTools();

    expect(tools).toHaveLength(10);
    expect(tools.map(tool => tool.name)).toContain('queue_push');
  });

  it('should run tool calls against the queue', async () => {
    const result = await client.callTool({
      name: 'submit',
      arguments: { kind: 'build', key: 'mcp-key', params: { target: 'ignored' } },
    });

    expect(result.isError).toBe(false);
    const tasks = await runtime.queue.listStatus({ key: 'mcp-key' });
    expect(tasks).toHaveLength(1);
    expect(tasks[0]?.kind).toBe('build');
  });

  it('should flag failed tool calls as errors', async () => {
    const result = await client.callTool({ name: 'get_status', arguments: { taskId: 'missing' } });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      {
        type: 'text',
        text: JSON.stringify({ success: false, error: 'Task missing not found', errorCode: 'NOT_FOUND' }, null, 2),
      },
    ]);
  });
});
