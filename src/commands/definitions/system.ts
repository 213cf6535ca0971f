/**
 * System Commands (Health Check)
 */

import chalk from '../../utils/chalk.js';
import { CommandParameter, CommandResult, CommandTypes, defineCommand } from '../types.js';

export interface HealthCheckData {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  storage: {
    healthy: boolean;
    message?: string;
  };
  queue: {
    accepting: boolean;
    paused: boolean;
    busyWorkers: number;
    concurrency: number;
  };
}

function formatHealthCheck(data: HealthCheckData): string {
  const statusColor = data.status === 'healthy' ? chalk.green : chalk.red;
  let output = `\n${chalk.bold('System Status:')} ${statusColor(data.status.toUpperCase())}\n`;
  output += `${chalk.gray('Timestamp:')} ${new Date(data.timestamp).toLocaleString()}\n`;

  output += `\n${chalk.bold('Storage:')}\n`;
  const storageStatus = data.storage.healthy ? chalk.green('✓ Healthy') : chalk.red('✗ Unhealthy');
  output += `  Status: ${storageStatus}\n`;
  if (data.storage.message) {
    output += `  Message: ${data.storage.message}\n`;
  }

  output += `\n${chalk.bold('Queue:')}\n`;
  output += `  Accepting: ${data.queue.accepting ? chalk.green('yes') : chalk.red('no')}\n`;
  output += `  Paused: ${data.queue.paused ? chalk.yellow('yes') : 'no'}\n`;
  output += `  Workers: ${data.queue.busyWorkers}/${data.queue.concurrency} busy\n`;

  return output;
}

export const healthCheck = defineCommand({
  name: 'healthCheck',
  mcpName: 'health_check',
  cliName: 'health-check',
  description: 'Check the queue and its task store',
  parameters: [] as const satisfies CommandParameter[],
  returnDataType: 'health',
  readOnly: true,
  formatResult: (result: CommandResult<HealthCheckData>) => {
    return result.data ? formatHealthCheck(result.data) : '';
  },
  async handler(context) {
    const storage = await context.store.healthCheck();
    const stats = await context.queue.getQueueStats();
    const healthy = storage.healthy && context.queue.isAccepting;

    return {
      success: healthy,
      data: {
        status: healthy ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        storage,
        queue: {
          accepting: context.queue.isAccepting,
          paused: stats.paused,
          busyWorkers: stats.busyWorkers,
          concurrency: stats.concurrency,
        },
      },
      ...(healthy ? {} : { error: storage.message ?? 'Queue is not accepting tasks' }),
    } satisfies CommandResult<HealthCheckData>;
  },
});

export type HealthCheckTypes = CommandTypes<typeof healthCheck>;
