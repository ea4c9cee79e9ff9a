import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { errorHandler } from './errors.js';
import { componentRoutes } from './routes/components.js';
import { stageRoutes } from './routes/stages.js';
import { workflowRoutes } from './routes/workflow.js';
import type { AppOptions, HealthResponse } from './types.js';

export const API_PREFIX = '/api/v1';

/**
 * Build the Fastify app with every route registered. Does not listen, so
 * tests can drive it with `inject`.
 */
export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const { store, executor, now, corsOrigin } = options;
  const app = Fastify({ logger: false });
  const startedAt = Date.now();

  await app.register(cors, { origin: corsOrigin });
  app.setErrorHandler(errorHandler);
  app.setNotFoundHandler((request, reply) => {
    reply.status(404).send({ error: `Route ${request.method} ${request.url} not found` });
  });

  app.get(`${API_PREFIX}/health`, async (): Promise<HealthResponse> => {
    return {
      status: 'ok',
      timestamp: (now ?? (() => new Date()))().toISOString(),
      uptime: Math.floor((Date.now() - startedAt) / 1000),
    };
  });

  await app.register(componentRoutes, { prefix: API_PREFIX, store });
  await app.register(stageRoutes, { prefix: API_PREFIX, store });
  await app.register(workflowRoutes, { prefix: API_PREFIX, store, executor, now });

  return app;
}
