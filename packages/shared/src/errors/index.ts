/**
 * Custom error hierarchy for Tidewater
 */

import type { FailureKind } from '../types/pipeline.js';

export type ErrorCategory =
  | 'VALIDATION'
  | 'TEST'
  | 'BUILD'
  | 'INFRASTRUCTURE'
  | 'ROLLOUT'
  | 'CACHE'
  | 'STATE_MACHINE'
  | 'CONFIGURATION'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  runId?: string;
  serviceId?: string;
  stage?: string;
  [key: string]: unknown;
}

/**
 * Base error class for Tidewater
 */
export class TidewaterError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'TidewaterError';
    this.code = code;
    this.context = {
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
      ...context,
    };
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Validation errors (pipeline spec, request bodies)
 */
export class ValidationError extends TidewaterError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'VALIDATION',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'ValidationError';
  }
}

/**
 * A test stage reported failing assertions. Only a code change fixes it.
 */
export class TestFailureError extends TidewaterError {
  public readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null, context: Partial<ErrorContext> = {}) {
    super(message, 'E2001', {
      category: 'TEST',
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'TestFailureError';
    this.exitCode = exitCode;
  }
}

/**
 * Compile or containerization error
 */
export class BuildFailureError extends TidewaterError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E2002', {
      category: 'BUILD',
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'BuildFailureError';
  }
}

/**
 * Registry or cluster API timeout / 5xx
 */
export class TransientInfraError extends TidewaterError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E3001', {
      category: 'INFRASTRUCTURE',
      severity: 'MEDIUM',
      retryable: true,
      ...context,
    });
    this.name = 'TransientInfraError';
  }
}

/**
 * Registry rejected a request for a non-transient reason (auth, missing repository)
 */
export class RegistryError extends TidewaterError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E3002', {
      category: 'INFRASTRUCTURE',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'RegistryError';
  }
}

/**
 * Cluster API rejected a request for a non-transient reason
 */
export class ClusterError extends TidewaterError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number, context: Partial<ErrorContext> = {}) {
    super(message, 'E3003', {
      category: 'INFRASTRUCTURE',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'ClusterError';
    this.statusCode = statusCode;
  }
}

/**
 * A rollout did not become stable in time. Triggers rollback, never a retry.
 */
export class RolloutTimeoutError extends TidewaterError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, context: Partial<ErrorContext> = {}) {
    super(`Rollout did not stabilize within ${timeoutMs}ms`, 'E4001', {
      category: 'ROLLOUT',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'RolloutTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The cluster reported the rollout as failed (crash loops, progress deadline)
 */
export class RolloutFailedError extends TidewaterError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E4002', {
      category: 'ROLLOUT',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'RolloutFailedError';
  }
}

/**
 * Two different artifacts were written under the same fingerprint.
 * Fatal to the run.
 */
export class FingerprintCollisionError extends TidewaterError {
  public readonly key: string;

  constructor(key: string, context: Partial<ErrorContext> = {}) {
    super(`Fingerprint collision: key '${key}' already holds a different artifact`, 'E5001', {
      category: 'CACHE',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'FingerprintCollisionError';
    this.key = key;
  }
}

/**
 * State machine errors
 */
export class InvalidTransitionError extends TidewaterError {
  constructor(fromState: string, toState: string, context: Partial<ErrorContext> = {}) {
    super(`Invalid state transition: ${fromState} -> ${toState}`, 'E5002', {
      category: 'STATE_MACHINE',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends TidewaterError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E6001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Helper to check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TidewaterError) {
    return error.context.retryable;
  }
  return false;
}

/**
 * Reported failures are verdicts about the code under test; everything
 * else is an execution error.
 */
export function classifyFailure(error: unknown): FailureKind {
  if (
    error instanceof TestFailureError ||
    error instanceof BuildFailureError ||
    error instanceof RolloutTimeoutError ||
    error instanceof RolloutFailedError
  ) {
    return 'reported';
  }
  return 'execution';
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): TidewaterError {
  if (error instanceof TidewaterError) {
    return error;
  }

  if (error instanceof Error) {
    return new TidewaterError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      retryable: false,
      originalError: error.name,
      ...context,
    });
  }

  return new TidewaterError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    retryable: false,
    ...context,
  });
}
