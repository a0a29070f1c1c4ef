import { FastifyRequest, FastifyReply } from 'fastify';
import { UnauthorizedError } from '../lib';
import { verifyUserToken } from '../utils/jwt';
import { maskToken } from '../utils/logger';
import { setSentryRequestContext } from '../utils/sentry';

// Extend Fastify request type
declare module 'fastify' {
  interface FastifyRequest {
    user?: {
      id: string;
      username?: string;
    };
  }
}

/**
 * Bearer JWT authentication for the user-facing API
 */
export async function authenticateUser(request: FastifyRequest, _reply: FastifyReply) {
  const authHeader = request.headers.authorization;
  if (!authHeader?.startsWith('Bearer ')) {
    throw new UnauthorizedError('Authentication required');
  }
  const token = authHeader.substring(7);

  try {
    const payload = verifyUserToken(token);
    request.user = { id: payload.userId, username: payload.username };
    setSentryRequestContext(request, payload.userId);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    request.log.warn({ error: errorMessage, token: maskToken(token) }, 'Auth middleware: JWT verification failed');
    throw new UnauthorizedError('Invalid or expired token');
  }
}

/**
 * The authenticated user's id
 * @throws UnauthorizedError when the route ran without authenticateUser
 */
export function requireUserId(request: FastifyRequest): string {
  if (!request.user) {
    throw new UnauthorizedError('Authentication required');
  }
  return request.user.id;
}
