import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../src/app';
import type { AppContext } from '../../src/context';
import { generateUserToken } from '../../src/utils/jwt';

/**
 * Create a test Fastify instance
 * Same plugins and RFC 7807 error handling as production, over the given context
 */
export async function createTestApp(
  context: AppContext,
  checkDatabase: () => Promise<void> = async () => undefined
): Promise<FastifyInstance> {
  const app = await buildApp(context, { logger: false, checkDatabase });
  await app.ready();
  return app;
}

/**
 * Authorization header for a user
 */
export function authHeader(userId: string, username = 'testuser'): { authorization: string } {
  return { authorization: `Bearer ${generateUserToken({ userId, username })}` };
}

/**
 * Close the test app
 */
export async function closeTestApp(app: FastifyInstance): Promise<void> {
  await app.close();
}
