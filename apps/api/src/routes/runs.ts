/**
 * Runs API Routes
 * Trigger, inspect and cancel pipeline runs
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { createRunSpec } from '@tidewater/core';
import { createChildLogger, ValidationError } from '@tidewater/shared';

const logger = createChildLogger({ component: 'RunsAPI' });

// Request schemas
const triggerRunSchema = z.object({
  branch: z.string().min(1),
  commit: z.string().min(1),
  event: z.enum(['push', 'pull_request']).default('push'),
});

const listRunsSchema = z.object({
  branch: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

type RunParams = { Params: { id: string } };

export async function runsRoutes(app: FastifyInstance): Promise<void> {
  /**
   * POST /runs - Trigger a run of the configured pipeline
   */
  app.post('/', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const trigger = triggerRunSchema.parse(request.body);
      const definition = await app.services.loadPipeline();
      const runId = app.services.runManager.start(createRunSpec(definition, trigger));

      logger.info({ runId, branch: trigger.branch, commit: trigger.commit }, 'Run triggered');
      return reply.status(202).send({ data: { runId } });
    } catch (error) {
      if (error instanceof z.ZodError) {
        return reply.status(400).send({
          error: 'Validation failed',
          details: error.errors,
        });
      }
      if (error instanceof ValidationError) {
        logger.error({ error: error.message }, 'Pipeline spec rejected');
        return reply.status(422).send({ error: 'Invalid pipeline spec', message: error.message });
      }
      throw error;
    }
  });

  /**
   * GET /runs - Archived runs, newest first, plus the runs in flight
   */
  app.get('/', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = listRunsSchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: 'Validation failed', details: query.error.errors });
    }

    const runs = await app.services.runs.list(query.data);
    const active = app.services.runManager
      .list()
      .filter((run) => !query.data.branch || run.trigger.branch === query.data.branch);

    return { data: runs, active };
  });

  /**
   * GET /runs/:id - A run in flight or from the archive
   */
  app.get('/:id', async (request: FastifyRequest<RunParams>, reply: FastifyReply) => {
    const { id } = request.params;

    const active = app.services.runManager.get(id);
    if (active) {
      return { data: active, active: true };
    }

    const run = await app.services.runs.findById(id);
    if (!run) {
      return reply.status(404).send({ error: 'Run not found' });
    }

    const deployments = await app.services.deployments.findByRun(id);
    return { data: run, active: false, deployments };
  });

  /**
   * POST /runs/:id/cancel - Cooperative cancellation
   */
  app.post('/:id/cancel', async (request: FastifyRequest<RunParams>, reply: FastifyReply) => {
    const { id } = request.params;

    if (app.services.runManager.cancel(id)) {
      return reply.status(202).send({ data: { runId: id, status: 'cancelling' } });
    }

    const run = await app.services.runs.findById(id);
    if (run) {
      return reply.status(409).send({ error: 'Run already finished', verdict: run.verdict });
    }
    return reply.status(404).send({ error: 'Run not found' });
  });
}
