/**
 * Tidewater API Server
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import websocket from '@fastify/websocket';
import { createChildLogger, getConfig, validateConfig } from '@tidewater/shared';
import { closeDatabase, initializeDatabase } from '@tidewater/database';
import { registerRoutes } from './routes/index.js';
import { registerWebSocket } from './websocket/index.js';
import { initializeServices, shutdownServices, type AppServices } from './services/index.js';

const logger = createChildLogger({ component: 'API' });

// Extend Fastify instance with services
declare module 'fastify' {
  interface FastifyInstance {
    services: AppServices;
  }
}

async function main() {
  // Fail fast on misconfiguration
  const validation = validateConfig();
  if (!validation.valid) {
    logger.error({ errors: validation.errors }, 'Invalid configuration');
    process.exit(1);
  }
  const config = getConfig();

  // Initialize database
  initializeDatabase({ path: config.database.path });

  const services = initializeServices(config);

  // Create Fastify instance
  const app = Fastify({
    logger: false, // We use our own logger
  });

  // Decorate app with services for dependency injection
  app.decorate('services', services);

  // Register plugins
  await app.register(cors, {
    origin: config.server.corsOrigin === '*' ? true : config.server.corsOrigin.split(','),
  });

  await app.register(websocket);

  // Register routes
  await registerRoutes(app);

  // Register WebSocket handlers
  await registerWebSocket(app);

  // Health check endpoint
  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // Graceful shutdown: stop taking requests, let in-flight stages finish, then close the store
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await app.close();
    await shutdownServices();
    closeDatabase();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  // Start server
  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info(
      { pipeline: config.pipeline.specFile, releaseBranch: config.pipeline.releaseBranch },
      `Server started on ${config.server.host}:${config.server.port}`
    );
  } catch (err) {
    logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Unhandled error');
  process.exit(1);
});
