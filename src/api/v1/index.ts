import { FastifyInstance } from 'fastify';
import type { AppContext } from '../../context';
import { vcsRoutes } from './routes/vcs.routes';
import { receiversRoutes } from './routes/receivers.routes';

export type ApiV1Options = {
  context: AppContext;
};

/**
 * API v1 Router
 * All routes are prefixed with /v1
 */
export async function apiV1Routes(fastify: FastifyInstance, opts: ApiV1Options) {
  const { context } = opts;

  // Register route modules
  fastify.register(vcsRoutes, { prefix: '/vcs', deps: context });
  fastify.register(receiversRoutes, { prefix: '/receivers', receiver: context.receiver });

  // Health check for v1
  fastify.get('/health', async () => ({
    version: 'v1',
    status: 'ok',
    timestamp: new Date().toISOString(),
  }));
}
