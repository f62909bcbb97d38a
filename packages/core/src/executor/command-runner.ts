/**
 * Command Runner
 * Runs external processes and captures their output
 */

import { createChildLogger } from '@tidewater/shared';
import { spawn } from 'node:child_process';
import type { CommandOptions, CommandResult, CommandRunner } from './types.js';

/** Output kept per stream; earlier output is dropped once exceeded */
const MAX_CAPTURED_BYTES = 1024 * 1024;

export class ShellCommandRunner implements CommandRunner {
  private logger = createChildLogger({ component: 'CommandRunner' });

  run(command: string, args: string[], options: CommandOptions): Promise<CommandResult> {
    const startTime = Date.now();

    this.logger.debug({ command, args, cwd: options.cwd }, 'Executing command');

    return new Promise((resolve, reject) => {
      // Own process group, so a timeout also reaches whatever the shell started
      const detached = process.platform !== 'win32';
      const proc = spawn(command, args, {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        shell: options.shell ?? false,
        detached,
      });

      const terminate = (): void => {
        if (!detached || proc.pid === undefined) {
          proc.kill('SIGTERM');
          return;
        }
        try {
          process.kill(-proc.pid, 'SIGTERM');
        } catch (error) {
          this.logger.warn(
            { command, pid: proc.pid, error: error instanceof Error ? error.message : String(error) },
            'Failed to signal process group'
          );
          proc.kill('SIGTERM');
        }
      };

      let stdout = '';
      let stderr = '';
      let timedOut = false;

      const timer = options.timeoutMs
        ? setTimeout(() => {
            timedOut = true;
            terminate();
          }, options.timeoutMs)
        : undefined;

      proc.stdout.on('data', (data: Buffer) => {
        stdout = keepTail(stdout + data.toString());
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr = keepTail(stderr + data.toString());
      });

      proc.on('error', (error) => {
        if (timer) clearTimeout(timer);
        reject(error);
      });

      proc.on('close', (exitCode) => {
        if (timer) clearTimeout(timer);

        const result: CommandResult = {
          exitCode,
          stdout,
          stderr,
          timedOut,
          durationMs: Date.now() - startTime,
        };

        this.logger.debug({ command, exitCode, timedOut, durationMs: result.durationMs }, 'Command finished');
        resolve(result);
      });

      if (options.input !== undefined) {
        proc.stdin.end(options.input);
      } else {
        proc.stdin.end();
      }
    });
  }
}

function keepTail(text: string): string {
  return text.length > MAX_CAPTURED_BYTES ? text.slice(text.length - MAX_CAPTURED_BYTES) : text;
}

/**
 * Split captured output into log lines
 */
export function toLogLines(...chunks: string[]): string[] {
  return chunks
    .join('\n')
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0);
}
