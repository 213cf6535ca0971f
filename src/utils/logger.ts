import { performance } from 'perf_hooks';
import * as fs from 'fs';
import * as path from 'path';

/**
 * Structured JSON logger.
 * One line per entry; children carry bound context such as taskId and key.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogValue = string | number | boolean | null | undefined | string[];

export interface LogContext {
  correlationId?: string;
  taskId?: string;
  key?: string;
  kind?: string;
  attempt?: number;
  operation?: string;
  duration?: number;
  [field: string]: LogValue;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };
  metrics?: {
    [key: string]: number;
  };
}

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

interface LoggerSink {
  testLogFile?: string;
  stderrOnly: boolean;
}

function describeError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    const code = 'code' in error && (typeof error.code === 'string' || typeof error.code === 'number')
      ? error.code
      : undefined;
    return { name: error.name, message: error.message, stack: error.stack, code };
  }
  return { name: 'NonError', message: String(error) };
}

class Logger {
  private logLevel: LogLevel;
  private readonly serviceName: string;
  private readonly environment: string;
  private readonly version: string;
  private readonly baseContext: LogContext;
  // Shared between a logger and its children
  private readonly sink: LoggerSink;

  constructor(
    serviceName: string = 'opsqueue',
    logLevel: LogLevel = 'info',
    environment: string = process.env.NODE_ENV || 'development',
    version: string = process.env.npm_package_version || '0.1.0',
    baseContext: LogContext = {},
    sink?: LoggerSink
  ) {
    this.serviceName = serviceName;
    this.logLevel = logLevel;
    this.environment = environment;
    this.version = version;
    this.baseContext = baseContext;

    if (sink) {
      this.sink = sink;
      return;
    }

    this.sink = { stderrOnly: false };
    if (this.environment === 'test' && process.env.TEST_LOG_FILE !== 'false') {
      const logDir = path.join(process.cwd(), 'test-logs');
      fs.mkdirSync(logDir, { recursive: true });
      this.sink.testLogFile = path.join(logDir, `test-${Date.now()}-${process.pid}.log`);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) <= LEVELS.indexOf(this.logLevel);
  }

  private formatLogEntry(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: unknown,
    metrics?: { [key: string]: number }
  ): LogEntry {
    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: {
        ...this.baseContext,
        ...context,
        service: this.serviceName,
        environment: this.environment,
        version: this.version,
      },
    };

    if (error !== undefined) {
      logEntry.error = describeError(error);
    }

    if (metrics) {
      logEntry.metrics = metrics;
    }

    return logEntry;
  }

  private writeLog(logEntry: LogEntry): void {
    const output = JSON.stringify(logEntry);

    if (this.sink.testLogFile) {
      try {
        fs.appendFileSync(this.sink.testLogFile, output + '\n');
        return;
      } catch (error) {
        console.error('Failed to write to test log file:', error);
      }
    }

    // stdout carries JSON-RPC in MCP mode
    if (this.sink.stderrOnly || logEntry.level === 'error' || logEntry.level === 'warn') {
      console.error(output);
    } else {
      console.log(output);
    }
  }

  error(message: string, context?: LogContext, error?: unknown): void {
    if (!this.shouldLog('error')) return;
    this.writeLog(this.formatLogEntry('error', message, context, error));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog('warn')) return;
    this.writeLog(this.formatLogEntry('warn', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    this.writeLog(this.formatLogEntry('info', message, context));
  }

  debug(message: string, context?: LogContext): void {
    if (!this.shouldLog('debug')) return;
    this.writeLog(this.formatLogEntry('debug', message, context));
  }

  trace(message: string, context?: LogContext): void {
    if (!this.shouldLog('trace')) return;
    this.writeLog(this.formatLogEntry('trace', message, context));
  }

  /**
   * Log with custom metrics
   */
  metric(message: string, metrics: { [key: string]: number }, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    this.writeLog(this.formatLogEntry('info', message, context, undefined, metrics));
  }

  /**
   * Time a function execution and log the result
   */
  async timeAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: LogContext
  ): Promise<T> {
    const startTime = performance.now();
    const operationContext = { ...context, operation };

    this.debug(`Starting operation: ${operation}`, operationContext);

    try {
      const result = await fn();
      const duration = performance.now() - startTime;

      this.metric(`Operation completed: ${operation}`,
        { duration, success: 1 },
        { ...operationContext, duration }
      );

      return result;
    } catch (error) {
      const duration = performance.now() - startTime;

      this.error(`Operation failed: ${operation}`,
        { ...operationContext, duration },
        error
      );

      throw error;
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger(
      this.serviceName,
      this.logLevel,
      this.environment,
      this.version,
      { ...this.baseContext, ...additionalContext },
      this.sink
    );
  }

  /**
   * Route every level to stderr (MCP stdio mode)
   */
  useStderr(enabled: boolean = true): void {
    this.sink.stderrOnly = enabled;
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.logLevel;
  }

  getTestLogFile(): string | undefined {
    return this.sink.testLogFile;
  }
}

// Create default logger instance
export const logger = new Logger();

// Export Logger class for custom instances
export { Logger };

/**
 * Helper function to create operation-specific loggers
 */
export function createOperationLogger(operation: string, context?: LogContext): Logger {
  return logger.child({ operation, ...context });
}

/**
 * Helper function to log HTTP requests
 */
export function logHttpRequest(
  method: string,
  path: string,
  statusCode: number,
  duration: number,
  context?: LogContext
): void {
  logger.metric(`HTTP ${method} ${path} ${statusCode}`, {
    http_status_code: statusCode,
    http_duration_ms: duration,
    http_success: statusCode < 400 ? 1 : 0
  }, {
    ...context,
    http_method: method,
    http_path: path,
    http_status_code: statusCode
  });
}
