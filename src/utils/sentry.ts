import * as Sentry from '@sentry/node';
import { config } from '../config';

let isInitialized = false;

function clientErrorStatus(error: unknown): boolean {
  if (!error || typeof error !== 'object') {
    return false;
  }
  const status =
    'status' in error && typeof error.status === 'number'
      ? error.status
      : 'statusCode' in error && typeof error.statusCode === 'number'
        ? error.statusCode
        : null;
  return status !== null && status >= 400 && status < 500;
}

/**
 * Initialize Sentry error tracking.
 * Must be called before Fastify starts and before workers pick up jobs.
 */
export function initSentry(): void {
  if (!config.sentry?.dsn) {
    return;
  }

  Sentry.init({
    dsn: config.sentry.dsn,
    environment: config.server.nodeEnv,
    release: config.sentry.release,

    tracesSampleRate: config.server.isProduction ? 0.1 : 1.0,

    // Only capture 5xx errors, not client errors (4xx)
    beforeSend(event, hint) {
      return clientErrorStatus(hint.originalException) ? null : event;
    },

    beforeSendTransaction(event) {
      if (event.request?.headers) {
        const sanitizedHeaders = { ...event.request.headers };
        delete sanitizedHeaders['authorization'];
        delete sanitizedHeaders['cookie'];
        delete sanitizedHeaders['x-gitlab-token'];
        event.request.headers = sanitizedHeaders;
      }
      return event;
    },
  });

  isInitialized = true;
}

export interface ErrorContext {
  requestId?: string;
  url?: string;
  method?: string;
  userId?: string;
  extra?: Record<string, unknown>;
}

/**
 * Capture an error in Sentry with additional context.
 * @returns the Sentry event id, used as correlation id on failed releases
 */
export function captureError(error: Error, context?: ErrorContext): string | undefined {
  if (!isInitialized) {
    return undefined;
  }

  return Sentry.withScope((scope) => {
    if (context?.userId) {
      scope.setUser({ id: context.userId });
    }

    if (context?.requestId || context?.url || context?.method) {
      scope.setContext('request', {
        requestId: context.requestId,
        url: context.url,
        method: context.method,
      });
    }

    scope.setTag('errorType', error.constructor.name);

    if (context?.extra) {
      scope.setExtras(context.extra);
    }

    return Sentry.captureException(error);
  });
}

/**
 * Add request/user context to current Sentry scope.
 * Call this in onRequest hook.
 */
export function setSentryRequestContext(
  request: { id: string; url: string; method: string },
  userId?: string
): void {
  if (!isInitialized) {
    return;
  }

  Sentry.setContext('request', {
    requestId: request.id,
    url: request.url,
    method: request.method,
  });

  if (userId) {
    Sentry.setUser({ id: userId });
  }
}

/**
 * Flush pending events and close Sentry client.
 * Call this during graceful shutdown.
 */
export async function closeSentry(timeoutMs = 2000): Promise<void> {
  if (!isInitialized) {
    return;
  }

  await Sentry.close(timeoutMs);
}
