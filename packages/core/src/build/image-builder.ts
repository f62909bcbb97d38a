/**
 * Image Builder
 * Builds and publishes container images through the Docker CLI
 */

import { createChildLogger, RegistryError, TransientInfraError } from '@tidewater/shared';
import type { RegistryCredentials } from '@tidewater/shared';
import { toLogLines } from '../executor/command-runner.js';
import type { CommandResult, CommandRunner } from '../executor/types.js';
import type {
  ContainerBuildBackend,
  ImageBuildRequest,
  ImageBuildResult,
  ImageBuilderConfig,
  ImagePushResult,
} from './types.js';
import { DEFAULT_IMAGE_BUILDER_CONFIG } from './types.js';

/** Registry failures worth retrying */
const TRANSIENT_PATTERNS = [
  /timeout/i,
  /timed out/i,
  /connection (reset|refused)/i,
  /TLS handshake/i,
  /unexpected EOF/i,
  /temporary failure/i,
  /too many requests/i,
  /\b(500|502|503|504)\b/,
];

export class DockerImageBuilder implements ContainerBuildBackend {
  private config: ImageBuilderConfig;
  private logger = createChildLogger({ component: 'ImageBuilder' });

  constructor(
    private readonly runner: CommandRunner,
    config: Partial<ImageBuilderConfig> = {}
  ) {
    this.config = { ...DEFAULT_IMAGE_BUILDER_CONFIG, ...config };
  }

  /**
   * Build an image tagged by the content digest of its inputs
   */
  async build(request: ImageBuildRequest): Promise<ImageBuildResult> {
    const startTime = Date.now();
    const imageRef = `${request.imageRepository}:build-${request.contentDigest.slice(0, this.config.digestTagLength)}`;

    const args = ['build', '-f', request.dockerfile, '-t', imageRef];

    for (const [key, value] of Object.entries(request.buildArgs ?? {})) {
      args.push('--build-arg', `${key}=${value}`);
    }

    const labels = {
      ...this.config.labels,
      ...request.labels,
      'tidewater.service': request.serviceId,
      'tidewater.digest': request.contentDigest,
    };
    for (const [key, value] of Object.entries(labels)) {
      args.push('--label', `${key}=${value}`);
    }

    args.push('.');

    this.logger.info({ serviceId: request.serviceId, imageRef, contextDir: request.contextDir }, 'Building image');

    const result = await this.runner.run(this.config.binary, args, {
      cwd: request.contextDir,
      timeoutMs: request.timeoutMs ?? this.config.buildTimeoutMs,
    });
    const logs = toLogLines(result.stdout, result.stderr);

    if (result.exitCode !== 0) {
      const error = result.timedOut
        ? `Build timed out after ${request.timeoutMs ?? this.config.buildTimeoutMs}ms`
        : lastLine(result.stderr) ?? `Build failed with exit code ${result.exitCode}`;

      this.logger.error({ serviceId: request.serviceId, error }, 'Image build failed');
      return { success: false, error, logs, durationMs: Date.now() - startTime };
    }

    const output = `${result.stdout}\n${result.stderr}`;
    const idMatch = output.match(/writing image sha256:([a-f0-9]+)/i) ?? output.match(/sha256:([a-f0-9]+)/);

    this.logger.info({ serviceId: request.serviceId, imageRef }, 'Image built successfully');

    return {
      success: true,
      imageRef,
      imageId: idMatch?.[1]?.slice(0, 12),
      logs,
      durationMs: Date.now() - startTime,
    };
  }

  async hasImage(imageRef: string): Promise<boolean> {
    const result = await this.runner.run(this.config.binary, ['image', 'inspect', '--format', '{{.Id}}', imageRef], {
      cwd: process.cwd(),
      timeoutMs: this.config.pushTimeoutMs,
    });
    return result.exitCode === 0;
  }

  /**
   * Tag a local image with every target reference and push each one.
   * Targets are pushed in the order given.
   */
  async push(
    imageRef: string,
    targetRefs: string[],
    credentials?: RegistryCredentials
  ): Promise<ImagePushResult> {
    const logs: string[] = [];

    if (credentials) {
      await this.login(credentials, logs);
    }

    let digest: string | undefined;
    for (const targetRef of targetRefs) {
      const tagResult = await this.runner.run(this.config.binary, ['tag', imageRef, targetRef], {
        cwd: process.cwd(),
      });
      if (tagResult.exitCode !== 0) {
        throw new RegistryError(`Failed to tag ${imageRef} as ${targetRef}: ${lastLine(tagResult.stderr) ?? 'unknown error'}`);
      }

      this.logger.info({ imageRef: targetRef }, 'Pushing image');

      const pushResult = await this.runner.run(this.config.binary, ['push', targetRef], {
        cwd: process.cwd(),
        timeoutMs: this.config.pushTimeoutMs,
      });
      logs.push(...toLogLines(pushResult.stdout, pushResult.stderr));

      if (pushResult.exitCode !== 0) {
        throw this.classifyPushFailure(targetRef, pushResult);
      }

      digest = pushResult.stdout.match(/digest: (sha256:[a-f0-9]+)/)?.[1] ?? digest;
    }

    this.logger.info({ imageRef, targetRefs, digest }, 'Image published');
    return { publishedRefs: targetRefs, digest, logs };
  }

  private async login(credentials: RegistryCredentials, logs: string[]): Promise<void> {
    const result = await this.runner.run(
      this.config.binary,
      ['login', credentials.server, '--username', credentials.username, '--password-stdin'],
      { cwd: process.cwd(), input: credentials.password, timeoutMs: this.config.pushTimeoutMs }
    );

    if (result.exitCode !== 0) {
      throw this.classifyPushFailure(credentials.server, result);
    }
    logs.push(`Logged in to ${credentials.server}`);
  }

  private classifyPushFailure(target: string, result: CommandResult): Error {
    const detail = lastLine(result.stderr) ?? `exit code ${result.exitCode}`;

    if (result.timedOut || TRANSIENT_PATTERNS.some((pattern) => pattern.test(result.stderr))) {
      return new TransientInfraError(`Registry request for ${target} failed: ${detail}`);
    }
    return new RegistryError(`Registry rejected ${target}: ${detail}`);
  }
}

function lastLine(text: string): string | undefined {
  const lines = toLogLines(text);
  return lines[lines.length - 1];
}
