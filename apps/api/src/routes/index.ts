/**
 * API Routes
 */

import type { FastifyInstance } from 'fastify';
import { healthRoutes } from './health.js';
import { runsRoutes } from './runs.js';
import { deploymentsRoutes } from './deployments.js';
import { cacheRoutes } from './cache.js';

export async function registerRoutes(app: FastifyInstance): Promise<void> {
  // API version prefix
  app.register(
    async (api) => {
      api.register(healthRoutes);

      // Trigger, inspect and cancel runs
      api.register(runsRoutes, { prefix: '/runs' });

      // Rollout history
      api.register(deploymentsRoutes, { prefix: '/deployments' });

      // Stage cache maintenance
      api.register(cacheRoutes, { prefix: '/cache' });
    },
    { prefix: '/api/v1' }
  );
}
