import Fastify, { FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { ZodError } from 'zod';
import { config } from './config';
import { ApiError, ValidationError } from './lib';
import { apiV1Routes } from './api/v1';
import type { AppContext } from './context';
import { AnalyticsEvents, trackEvent } from './utils/analytics';
import { captureError } from './utils/sentry';
import { sanitizeError, sanitizeHeaders, maskUrlToken } from './utils/logger';

declare module 'fastify' {
  interface FastifyRequest {
    /** Unparsed JSON body, kept for webhook signature checks */
    rawBody?: string;
  }
}

export interface BuildAppOptions {
  logger?: boolean;
  /** Resolves when the database answers */
  checkDatabase: () => Promise<void>;
}

export async function buildApp(context: AppContext, options: BuildAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger === false ? false : { level: config.server.logLevel },
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'reqId',
  });

  // Register security plugins
  await fastify.register(helmet, {
    contentSecurityPolicy: false, // JSON API only
  });

  await fastify.register(rateLimit, {
    max: 100, // 100 requests
    timeWindow: '15 minutes', // per 15 minutes
    addHeadersOnExceeding: {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true,
    },
    addHeaders: {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true,
      'retry-after': true,
    },
  });

  // JSON parser that keeps the raw body for signature verification
  fastify.addContentTypeParser<string>('application/json', { parseAs: 'string' }, (req, body, done) => {
    req.rawBody = body;
    try {
      done(null, body.length > 0 ? JSON.parse(body) : undefined);
    } catch (err) {
      done(err instanceof Error ? Object.assign(err, { statusCode: 400 }) : new Error('Invalid JSON body'), undefined);
    }
  });

  // Add request ID to all responses
  fastify.addHook('onSend', async (request, reply) => {
    reply.header('X-Request-ID', request.id);
  });

  // Health check endpoint
  fastify.get('/health', async (request, reply) => {
    let dbStatus = 'connected';
    try {
      await options.checkDatabase();
    } catch {
      dbStatus = 'disconnected';
    }

    const isHealthy = dbStatus === 'connected';
    const response = {
      status: isHealthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      environment: config.server.nodeEnv,
      database: dbStatus,
    };

    if (!isHealthy) {
      return reply.status(503).send(response);
    }
    return response;
  });

  // Global error handler (set before the routes so their contexts inherit it)
  fastify.setErrorHandler((error: Error & { statusCode?: number; validation?: unknown }, request, reply) => {
    // Sanitize to prevent token exposure
    request.log.error({
      err: sanitizeError(error),
      url: maskUrlToken(request.url),
      method: request.method,
      reqId: request.id,
      headers: sanitizeHeaders(request.headers),
    }, 'Request error');

    const status = error instanceof ApiError ? error.status : error.statusCode ?? 500;
    if (status >= 500) {
      captureError(error, { requestId: request.id, url: maskUrlToken(request.url), method: request.method, userId: request.user?.id });
    }

    trackEvent(request.user?.id ?? 'anonymous', AnalyticsEvents.API_ERROR, {
      endpoint: request.routeOptions.url ?? 'unknown',
      method: request.method,
      errorCode: error instanceof ApiError ? error.type.split('/').pop() ?? error.name : error.name,
    });

    // Handle RFC 7807 API errors (primary system)
    if (error instanceof ApiError) {
      return reply.status(error.status).send(error.toProblemDetails(request.id));
    }

    // Handle Zod validation errors - convert to RFC 7807
    if (error instanceof ZodError) {
      const validationError = ValidationError.fromZodError(error);
      return reply.status(400).send(validationError.toProblemDetails(request.id));
    }

    // Handle Fastify validation errors - convert to RFC 7807
    if (error.validation) {
      const validationError = new ValidationError(error.message || 'Invalid request data', []);
      return reply.status(400).send(validationError.toProblemDetails(request.id));
    }

    // Handle rate limit errors (from @fastify/rate-limit plugin)
    if (error.statusCode === 429) {
      return reply.status(429).send({
        type: '/errors/rate-limited',
        title: 'Too Many Requests',
        status: 429,
        detail: 'Too many requests, please try again later',
        traceId: request.id,
      });
    }

    // Default to 500 Internal Server Error (RFC 7807 format)
    const statusCode = error.statusCode || 500;
    return reply.status(statusCode).send({
      type: '/errors/internal-error',
      title: statusCode >= 500 ? 'Internal Server Error' : 'Error',
      status: statusCode,
      detail: config.server.isProduction && statusCode >= 500
        ? 'An unexpected error occurred'
        : error.message,
      traceId: request.id,
    });
  });

  // Register API v1 routes
  await fastify.register(apiV1Routes, { prefix: '/v1', context });

  return fastify;
}
