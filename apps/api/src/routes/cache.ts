/**
 * Stage cache maintenance routes
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { createChildLogger } from '@tidewater/shared';

const logger = createChildLogger({ component: 'CacheAPI' });

const invalidateSchema = z.object({
  // Keys are `<service>/<stage>/<digest>`, matched on whole segments; an empty prefix would drop everything
  prefix: z.string().min(1),
});

export async function cacheRoutes(app: FastifyInstance): Promise<void> {
  app.post('/invalidate', async (request: FastifyRequest, reply: FastifyReply) => {
    const body = invalidateSchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'Validation failed', details: body.error.errors });
    }

    const removed = await app.services.cache.invalidate(body.data.prefix);
    logger.info({ prefix: body.data.prefix, removed }, 'Cache invalidated through API');
    return { data: { prefix: body.data.prefix, removed } };
  });
}
