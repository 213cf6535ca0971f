import { spawn } from 'child_process';

export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  signal: AbortSignal;
  onStdoutLine?: (line: string) => void;
}

export type CommandRunner = (command: string, args: string[], options: CommandOptions) => Promise<ProcessResult>;

// Characters of stdout and stderr kept per command; the digest and the error sit at the end
export const MAX_COMMAND_OUTPUT = 64 * 1024;

/**
 * Append a chunk, keeping only the last `limit` characters
 */
export function appendBounded(current: string, chunk: string, limit: number = MAX_COMMAND_OUTPUT): string {
  const combined = current + chunk;
  return combined.length > limit ? combined.slice(combined.length - limit) : combined;
}

/**
 * Run a command to completion, collecting the tail of its output.
 * Aborting the signal kills the child and rejects with an AbortError.
 */
export const spawnCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      signal: options.signal,
      stdio: ['ignore', 'pipe', 'pipe'],
      env: process.env,
    });

    let stdout = '';
    let stderr = '';
    let partial = '';

    child.stdout?.on('data', (data: Buffer) => {
      const text = data.toString();
      stdout = appendBounded(stdout, text);
      if (options.onStdoutLine) {
        const lines = (partial + text).split('\n');
        partial = appendBounded('', lines.pop() ?? '');
        lines.filter(line => line.trim()).forEach(line => options.onStdoutLine?.(line.trim()));
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr = appendBounded(stderr, data.toString());
    });

    child.once('error', reject);
    child.once('close', (code) => {
      if (partial.trim()) options.onStdoutLine?.(partial.trim());
      resolve({ exitCode: code, stdout, stderr });
    });
  });
