/**
 * Structured logging for Tidewater
 */

import { pino } from 'pino';
import type { Logger as PinoLogger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = PinoLogger;

export interface LogContext {
  runId?: string;
  serviceId?: string;
  stage?: string;
  component?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(value: string | undefined): LogLevel {
  const match = LOG_LEVELS.find((level) => level === value);
  return match ?? 'info';
}

// Create base logger
function createBaseLogger(level: LogLevel = 'info'): Logger {
  return pino({
    level,
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    base: {
      service: 'tidewater',
    },
    // Credentials travel through stage and deploy calls; keep them out of the logs
    redact: {
      paths: ['password', '*.password', 'token', '*.token', 'credentials'],
      censor: '[redacted]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

// Singleton logger instance
let loggerInstance: Logger | null = null;

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = createBaseLogger(parseLogLevel(process.env.LOG_LEVEL));
  }
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): Logger {
  return getLogger().child(context);
}

// Structured event logging for pipeline progress
export function logStageTransition(
  runId: string,
  serviceId: string,
  stage: string,
  status: string
): void {
  getLogger().info(
    {
      event: 'stage_transition',
      runId,
      serviceId,
      stage,
      status,
    },
    `Stage ${serviceId}/${stage}: ${status}`
  );
}

export function logRolloutTransition(
  deploymentId: string,
  fromState: string,
  toState: string,
  reason?: string
): void {
  getLogger().info(
    {
      event: 'rollout_transition',
      deploymentId,
      fromState,
      toState,
      reason,
    },
    `Rollout transition: ${fromState} -> ${toState}`
  );
}
