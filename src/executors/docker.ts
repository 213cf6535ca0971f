import Joi from 'joi';
import type { TaskKind, TaskParams } from '../types/index.js';
import { getErrorMessage, isErrorWithCode } from '../types/index.js';
import { imageNameSchema, imageTagSchema, validate } from '../utils/validation.js';
import { Outcome } from './types.js';
import type { ExecutionContext, ExecutionOutcome, TaskExecutor } from './types.js';
import { spawnCommand } from './process.js';
import type { ProcessResult, CommandRunner } from './process.js';

export interface DockerExecutorOptions {
  binary: string;
  runner?: CommandRunner;
}

// Failures that no retry will fix: auth, missing images, malformed references
const FATAL_PATTERNS: RegExp[] = [
  /unauthorized/i,
  /authentication required/i,
  /denied/i,
  /invalid reference format/i,
  /no such image/i,
  /does not exist/i,
  /not found/i,
  /manifest unknown/i,
];

export function classifyDockerFailure(stderr: string): 'fatal' | 'retryable' {
  return FATAL_PATTERNS.some(pattern => pattern.test(stderr)) ? 'fatal' : 'retryable';
}

export function parseDigest(stdout: string): string | null {
  const match = /digest: (sha256:[a-f0-9]+)/i.exec(stdout);
  return match?.[1] ?? null;
}

/**
 * Shared flow for docker CLI operations: run, capture, classify.
 */
abstract class DockerExecutor<P extends TaskParams> implements TaskExecutor {
  abstract readonly kind: TaskKind;
  abstract readonly description: string;
  abstract readonly paramsSchema: Joi.ObjectSchema<P>;

  protected readonly binary: string;
  private readonly runner: CommandRunner;

  constructor(options: DockerExecutorOptions) {
    this.binary = options.binary;
    this.runner = options.runner ?? spawnCommand;
  }

  protected abstract buildArgs(params: P): string[];
  protected abstract summarize(params: P, stdout: string): Record<string, unknown>;
  protected abstract keyFor(params: P): string;

  deriveKey(params: TaskParams): string {
    return this.keyFor(validate(this.paramsSchema, params));
  }

  async execute(rawParams: TaskParams, context: ExecutionContext): Promise<ExecutionOutcome> {
    const params = validate(this.paramsSchema, rawParams);
    const args = this.buildArgs(params);
    const command = [this.binary, ...args].join(' ');

    context.reportProgress(10, `Running ${command}`);
    context.log(`$ ${command}`);

    let result: ProcessResult;
    try {
      result = await this.runner(this.binary, args, {
        signal: context.signal,
        onStdoutLine: line => context.log(line),
      });
    } catch (error) {
      if (isErrorWithCode(error) && error.code === 'ENOENT') {
        return Outcome.fatal(`${this.binary} executable not found`);
      }
      return Outcome.retryable(`${command} did not complete: ${getErrorMessage(error)}`);
    }

    if (result.exitCode === 0) {
      context.reportProgress(90, 'Finalizing');
      return Outcome.success({ ...this.summarize(params, result.stdout), command });
    }

    const detail = result.stderr.trim() || `exit code ${result.exitCode ?? 'unknown'}`;
    const reason = `docker ${this.kind} failed: ${detail}`;
    return classifyDockerFailure(detail) === 'fatal' ? Outcome.fatal(reason) : Outcome.retryable(reason);
  }
}

export type PushParams = {
  imageName: string;
  tag: string;
  allTags: boolean;
  disableContentTrust: boolean;
  quiet: boolean;
};

export class DockerPushExecutor extends DockerExecutor<PushParams> {
  readonly kind = 'push';
  readonly description = 'Push a local image to its registry';
  readonly paramsSchema = Joi.object<PushParams>({
    imageName: imageNameSchema.required(),
    tag: imageTagSchema.default('latest'),
    allTags: Joi.boolean().default(false),
    disableContentTrust: Joi.boolean().default(true),
    quiet: Joi.boolean().default(false),
  });

  protected keyFor(params: PushParams): string {
    return `${params.imageName}:${params.allTags ? '*' : params.tag}`;
  }

  protected buildArgs(params: PushParams): string[] {
    const args = ['push'];
    if (params.allTags) args.push('--all-tags');
    if (params.disableContentTrust) args.push('--disable-content-trust');
    if (params.quiet) args.push('--quiet');
    args.push(params.allTags ? params.imageName : `${params.imageName}:${params.tag}`);
    return args;
  }

  protected summarize(params: PushParams, stdout: string): Record<string, unknown> {
    return {
      imageName: params.imageName,
      tag: params.allTags ? 'all' : params.tag,
      fullImageName: params.allTags ? params.imageName : `${params.imageName}:${params.tag}`,
      digest: parseDigest(stdout),
      layers: stdout.split('\n').filter(line => /Pushed|Mounted|Layer already exists/.test(line)).length,
    };
  }
}

export type PullParams = {
  imageName: string;
  tag: string;
  platform?: string;
  quiet: boolean;
};

export class DockerPullExecutor extends DockerExecutor<PullParams> {
  readonly kind = 'pull';
  readonly description = 'Pull an image from its registry';
  readonly paramsSchema = Joi.object<PullParams>({
    imageName: imageNameSchema.required(),
    tag: imageTagSchema.default('latest'),
    platform: Joi.string().pattern(/^[a-z0-9]+\/[a-z0-9]+(\/[a-z0-9]+)?$/).optional(),
    quiet: Joi.boolean().default(false),
  });

  protected keyFor(params: PullParams): string {
    return `${params.imageName}:${params.tag}`;
  }

  protected buildArgs(params: PullParams): string[] {
    const args = ['pull'];
    if (params.platform) args.push('--platform', params.platform);
    if (params.quiet) args.push('--quiet');
    args.push(`${params.imageName}:${params.tag}`);
    return args;
  }

  protected summarize(params: PullParams, stdout: string): Record<string, unknown> {
    return {
      imageName: params.imageName,
      tag: params.tag,
      fullImageName: `${params.imageName}:${params.tag}`,
      digest: parseDigest(stdout),
    };
  }
}

export type BuildParams = {
  tag: string;
  dockerfilePath: string;
  contextPath: string;
  buildArgs: Record<string, string>;
  noCache: boolean;
};

export class DockerBuildExecutor extends DockerExecutor<BuildParams> {
  readonly kind = 'build';
  readonly description = 'Build an image from a Dockerfile';
  readonly paramsSchema = Joi.object<BuildParams>({
    tag: Joi.string().min(1).max(255).pattern(/^[a-z0-9][a-z0-9._\/:-]*$/).required(),
    dockerfilePath: Joi.string().default('Dockerfile'),
    contextPath: Joi.string().default('.'),
    buildArgs: Joi.object().pattern(/^[A-Za-z_][A-Za-z0-9_]*$/, Joi.string()).default({}),
    noCache: Joi.boolean().default(false),
  });

  protected keyFor(params: BuildParams): string {
    return params.tag;
  }

  protected buildArgs(params: BuildParams): string[] {
    const args = ['build', '-t', params.tag, '-f', params.dockerfilePath];
    for (const [name, value] of Object.entries(params.buildArgs)) {
      args.push('--build-arg', `${name}=${value}`);
    }
    if (params.noCache) args.push('--no-cache');
    args.push(params.contextPath);
    return args;
  }

  protected summarize(params: BuildParams, stdout: string): Record<string, unknown> {
    const imageId = /(?:writing image|Successfully built) (sha256:[a-f0-9]+|[a-f0-9]{12,})/.exec(stdout);
    return {
      tag: params.tag,
      imageId: imageId?.[1] ?? null,
    };
  }
}

export function createDockerExecutors(options: DockerExecutorOptions): TaskExecutor[] {
  return [
    new DockerPushExecutor(options),
    new DockerPullExecutor(options),
    new DockerBuildExecutor(options),
  ];
}
