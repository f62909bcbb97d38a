/**
 * Zod schemas for the JSON columns.
 * Rows are validated on the way out so a stale or hand-edited database
 * surfaces as a ValidationError rather than a malformed result.
 */

import { z } from 'zod';
import { ValidationError } from '@tidewater/shared';

const rolloutStateSchema = z.enum(['pending', 'in-progress', 'stable', 'failed', 'rolled-back']);

export const rolloutTransitionSchema = z.object({
  from: rolloutStateSchema,
  to: rolloutStateSchema,
  at: z.coerce.date(),
  reason: z.string().optional(),
});

export const deploymentResultSchema = z.object({
  deploymentId: z.string(),
  serviceId: z.string(),
  target: z.object({
    cluster: z.string(),
    namespace: z.string(),
    deployment: z.string(),
    container: z.string().optional(),
  }),
  state: rolloutStateSchema,
  outcome: z.enum(['stable', 'failed']),
  rolledBack: z.boolean(),
  imageRef: z.string(),
  previousImageRef: z.string().optional(),
  message: z.string().optional(),
  failureReason: z.enum(['timeout', 'unhealthy', 'apply-failed']).optional(),
  transitions: z.array(rolloutTransitionSchema),
  durationMs: z.number(),
});

export const stageOutputSchema = z.object({
  imageRef: z.string().optional(),
  tags: z.array(z.string()).optional(),
  report: z.string().optional(),
  deployment: deploymentResultSchema.optional(),
});

export const stageErrorSchema = z.object({
  code: z.string(),
  name: z.string(),
  message: z.string(),
  kind: z.enum(['reported', 'execution']),
});

const stageResultSchema = z.object({
  stage: z.string(),
  kind: z.enum(['test', 'build', 'push', 'deploy']),
  status: z.enum(['passed', 'failed', 'cached', 'skipped']),
  fingerprint: z.string().optional(),
  output: stageOutputSchema.optional(),
  logs: z.array(z.string()),
  error: stageErrorSchema.optional(),
  attempts: z.number(),
  durationMs: z.number(),
});

export const pipelineResultsSchema = z.array(
  z.object({
    serviceId: z.string(),
    stageResults: z.array(stageResultSchema),
    finalStatus: z.enum(['success', 'failed', 'cancelled', 'not-started']),
    failureKind: z.enum(['reported', 'execution']).optional(),
    durationMs: z.number(),
  })
);

/**
 * Parse a JSON column against its schema
 */
export function parseColumn<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, column: string, value: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(value);
  } catch (error) {
    throw new ValidationError(`Column ${column} holds invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Column ${column} does not match its schema`, {
      issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
    });
  }
  return parsed.data;
}
