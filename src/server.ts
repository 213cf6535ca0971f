import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { v4 as uuidv4 } from 'uuid';
import { Server } from 'http';
import { ApiResponse, getErrorMessage } from './types/index.js';
import type { OpsQueueConfig } from './config/types.js';
import { createQueueRuntime, QueueRuntime } from './runtime.js';
import { taskFiltersSchema, validate } from './utils/validation.js';
import { isQueueError, statusCodeFor, ValidationError } from './utils/errors.js';
import { logger, logHttpRequest } from './utils/logger.js';
import { metrics, QueueMetrics } from './utils/metrics.js';

function logUnexpectedError(error: unknown, context: string, correlationId?: string): void {
  logger.error(`Unexpected error in ${context}`, { correlationId }, error);
}

// Extend Express Request to include the correlation id
declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

/**
 * HTTP server for the queue
 * Provides REST access to submission, status and administration
 */
export class OpsQueueHttpServer {
  private app: express.Application;
  private server: Server | undefined;
  private readonly runtime: QueueRuntime;

  constructor(private readonly config: OpsQueueConfig, runtime?: QueueRuntime) {
    this.runtime = runtime ?? createQueueRuntime(config);
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): express.Application {
    return this.app;
  }

  /**
   * Start the queue without listening (used by tests driving the app directly)
   */
  async initialize(): Promise<void> {
    await this.runtime.start();
  }

  async start(): Promise<void> {
    try {
      await this.initialize();

      await new Promise<void>((resolve) => {
        this.server = this.app.listen(this.config.server.port, this.config.server.host, () => {
          logger.info('HTTP server started', {
            host: this.config.server.host,
            port: this.config.server.port,
            url: `http://${this.config.server.host}:${this.config.server.port}`,
          });
          metrics.setGauge(QueueMetrics.serverStarted.name, 1);
          resolve();
        });
      });
    } catch (error) {
      logUnexpectedError(error, 'start HTTP server');
      throw error;
    }
  }

  async stop(): Promise<void> {
    logger.info('Stopping HTTP server...');

    if (this.server) {
      const server = this.server;
      await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      });
      this.server = undefined;
    }

    await this.runtime.stop();
    metrics.setGauge(QueueMetrics.serverStarted.name, 0);
    logger.info('HTTP server shutdown complete');
  }

  private setupMiddleware(): void {
    // Correlation id, request logging and metrics
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const startTime = Date.now();
      const correlationId = req.get('x-correlation-id') || uuidv4();

      req.correlationId = correlationId;
      res.setHeader('x-correlation-id', correlationId);

      metrics.incrementCounter(QueueMetrics.httpRequestsTotal.name, {
        method: req.method,
        path: req.path,
      });
      metrics.incrementGauge(QueueMetrics.httpRequestsInFlight.name);

      res.on('finish', () => {
        const duration = Date.now() - startTime;
        logHttpRequest(req.method, req.path, res.statusCode, duration, {
          correlationId,
          userAgent: req.get('user-agent'),
          ip: req.ip,
        });
        metrics.observeHistogram(QueueMetrics.httpRequestDuration.name, duration / 1000, {
          method: req.method,
          path: req.path,
          status: res.statusCode.toString(),
        });
        metrics.decrementGauge(QueueMetrics.httpRequestsInFlight.name);
      });

      next();
    });

    // Security middleware
    this.app.use(helmet());
    this.app.use(cors({
      origin: this.config.http.corsOrigin,
      credentials: true,
    }));

    this.app.use('/api/', rateLimit({
      windowMs: this.config.http.rateLimitWindowMs,
      max: this.config.http.rateLimitMax,
      message: 'Too many requests from this IP, please try again later.',
    }));

    this.app.use(express.json({ limit: '1mb' }));
  }

  private setupRoutes(): void {
    this.app.get('/health', this.handleHealthCheck.bind(this));
    this.app.get('/metrics', this.handleMetrics.bind(this));
    this.app.get('/metrics/json', this.handleMetricsJson.bind(this));

    this.app.use('/api', this.createApiRouter());

    this.app.use((req: Request, res: Response) => {
      logger.warn('Route not found', {
        correlationId: req.correlationId,
        method: req.method,
        path: req.path,
      });
      this.sendError(res, 'Not Found', 404, 'NOT_FOUND');
    });

    // Catches malformed JSON bodies and anything a handler let through
    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof SyntaxError) {
        this.sendError(res, `Invalid JSON body: ${error.message}`, 400, 'VALIDATION_ERROR');
        return;
      }
      logUnexpectedError(error, `${req.method} ${req.path}`, req.correlationId);
      metrics.incrementCounter(QueueMetrics.httpErrors.name, {
        method: req.method,
        path: req.path,
      });

      const isProduction = process.env.NODE_ENV === 'production';
      this.sendError(res, isProduction ? 'Internal Server Error' : getErrorMessage(error), 500, 'INTERNAL_ERROR');
    });
  }

  private createApiRouter(): express.Router {
    const router = express.Router();

    // Tasks
    router.post('/tasks', this.handleSubmit.bind(this));
    router.post('/push', this.handleQueuePush.bind(this));
    router.get('/tasks', this.handleListTasks.bind(this));
    router.delete('/tasks', this.handleClearFinished.bind(this));
    router.get('/tasks/:taskId', this.handleGetTask.bind(this));
    router.post('/tasks/:taskId/cancel', this.handleCancel.bind(this));

    // Queue administration
    router.get('/queue/stats', this.handleQueueStats.bind(this));
    router.post('/queue/pause', this.handlePause.bind(this));
    router.post('/queue/resume', this.handleResume.bind(this));

    return router;
  }

  // Monitoring endpoint handlers
  private async handleHealthCheck(req: Request, res: Response): Promise<void> {
    try {
      const storage = await this.runtime.store.healthCheck();
      const healthy = storage.healthy && this.runtime.queue.isAccepting;
      const body = {
        status: healthy ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        storage,
        queue: { accepting: this.runtime.queue.isAccepting },
      };
      res.status(healthy ? 200 : 503).json(body);
    } catch (error) {
      this.handleError(req, res, error, 'health check');
    }
  }

  private handleMetrics(req: Request, res: Response): void {
    res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.send(metrics.getPrometheusMetrics());
  }

  private handleMetricsJson(req: Request, res: Response): void {
    this.sendSuccess(res, {
      ...metrics.getJsonMetrics(),
      system: metrics.getSystemMetrics(),
    });
  }

  // Task handlers
  private async handleSubmit(req: Request, res: Response): Promise<void> {
    try {
      const body: unknown = req.body;
      const task = await this.runtime.queue.submit(validateSubmitBody(body));
      this.sendSuccess(res, task, 202);
    } catch (error) {
      this.handleError(req, res, error, 'submit task');
    }
  }

  private async handleQueuePush(req: Request, res: Response): Promise<void> {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        throw new ValidationError('Request body must be a JSON object');
      }
      const task = await this.runtime.queue.submit({ kind: 'push', params: body });
      this.sendSuccess(res, task, 202);
    } catch (error) {
      this.handleError(req, res, error, 'queue push');
    }
  }

  private async handleListTasks(req: Request, res: Response): Promise<void> {
    try {
      const filters = validate(taskFiltersSchema, { ...req.query });
      const tasks = await this.runtime.queue.listStatus(filters);
      this.sendSuccess(res, tasks);
    } catch (error) {
      this.handleError(req, res, error, 'list tasks');
    }
  }

  private async handleGetTask(req: Request, res: Response): Promise<void> {
    try {
      const taskId = this.validateRequiredParam(req.params.taskId, 'Task ID');
      const task = await this.runtime.queue.getStatus(taskId);
      this.sendSuccess(res, task);
    } catch (error) {
      this.handleError(req, res, error, 'get task');
    }
  }

  private async handleCancel(req: Request, res: Response): Promise<void> {
    try {
      const taskId = this.validateRequiredParam(req.params.taskId, 'Task ID');
      const outcome = await this.runtime.queue.cancel(taskId);
      this.sendSuccess(res, outcome);
    } catch (error) {
      this.handleError(req, res, error, 'cancel task');
    }
  }

  private async handleClearFinished(req: Request, res: Response): Promise<void> {
    try {
      const removed = await this.runtime.queue.clearFinished();
      this.sendSuccess(res, { removed });
    } catch (error) {
      this.handleError(req, res, error, 'clear finished tasks');
    }
  }

  // Queue administration handlers
  private async handleQueueStats(req: Request, res: Response): Promise<void> {
    try {
      const stats = await this.runtime.queue.getQueueStats();
      this.sendSuccess(res, stats);
    } catch (error) {
      this.handleError(req, res, error, 'queue stats');
    }
  }

  private handlePause(req: Request, res: Response): void {
    this.runtime.queue.pause();
    this.sendSuccess(res, { paused: true });
  }

  private handleResume(req: Request, res: Response): void {
    this.runtime.queue.resume();
    this.sendSuccess(res, { paused: false });
  }

  // Helper methods
  private validateRequiredParam(value: string | undefined, name: string): string {
    if (!value) {
      throw new ValidationError(`${name} is required`);
    }
    return value;
  }

  private handleError(req: Request, res: Response, error: unknown, operation: string): void {
    if (!isQueueError(error)) {
      logUnexpectedError(error, operation, req.correlationId);
      metrics.incrementCounter(QueueMetrics.httpErrors.name, { method: req.method, path: req.path });
    }
    const code = isQueueError(error) ? error.code : 'INTERNAL_ERROR';
    this.sendError(res, getErrorMessage(error), statusCodeFor(error), code);
  }

  private sendSuccess<T>(res: Response, data: T, statusCode: number = 200): void {
    const response: ApiResponse<T> = {
      success: true,
      data,
      timestamp: new Date(),
    };
    res.status(statusCode).json(response);
  }

  private sendError(res: Response, message: string, statusCode: number, errorCode: string): void {
    const response: ApiResponse<null> = {
      success: false,
      error: message,
      errorCode,
      timestamp: new Date(),
    };
    res.status(statusCode).json(response);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateSubmitBody(body: unknown): { kind: string; key?: string; params?: unknown } {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  const { kind, key, params } = body;
  if (typeof kind !== 'string') {
    throw new ValidationError('Validation failed: kind: "kind" is required', [{ field: 'kind', message: '"kind" is required' }]);
  }
  if (key !== undefined && typeof key !== 'string') {
    throw new ValidationError('Validation failed: key: "key" must be a string', [{ field: 'key', message: '"key" must be a string', value: key }]);
  }
  return { kind, key, params };
}
