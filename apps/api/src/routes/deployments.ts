/**
 * Deployment history routes
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';

const listDeploymentsSchema = z.object({
  serviceId: z.string().min(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export async function deploymentsRoutes(app: FastifyInstance): Promise<void> {
  app.get('/', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = listDeploymentsSchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: 'Validation failed', details: query.error.errors });
    }

    const deployments = await app.services.deployments.findByService(query.data.serviceId, query.data.limit);
    return { data: deployments };
  });

  app.get('/:id', async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
    const deployment = await app.services.deployments.findById(request.params.id);
    if (!deployment) {
      return reply.status(404).send({ error: 'Deployment not found' });
    }
    return { data: deployment };
  });
}
