/**
 * Logger utilities for sanitizing sensitive data from logs
 */

type HeaderBag = Record<string, string | string[] | undefined>;

export interface SanitizedError {
  name?: string;
  message: string;
  status?: number;
  kind?: string;
  stack?: string;
  cause?: SanitizedError;
}

/**
 * Mask a token by showing only the last 4 characters
 * @returns Masked token string (e.g., "***abc123")
 */
export function maskToken(token: string | undefined | null): string {
  if (!token) return '[none]';
  if (token.length <= 4) return '***';
  return `***${token.slice(-4)}`;
}

/**
 * Strip the webhook access token from a receiver URL before it is logged
 */
export function maskUrlToken(url: string): string {
  return url.replace(/([?&]access_token=)([^&]+)/, (_match, prefix: string, token: string) => `${prefix}${maskToken(token)}`);
}

/**
 * Sanitize request headers to remove sensitive tokens
 */
export function sanitizeHeaders(headers: HeaderBag): HeaderBag {
  const sanitized: HeaderBag = { ...headers };

  const authorization = sanitized.authorization;
  if (authorization) {
    if (typeof authorization === 'string' && authorization.startsWith('Bearer ')) {
      sanitized.authorization = `Bearer ${maskToken(authorization.substring(7))}`;
    } else {
      sanitized.authorization = '[REDACTED]';
    }
  }

  // Provider webhook secrets
  if (sanitized['x-gitlab-token']) {
    sanitized['x-gitlab-token'] = '[REDACTED]';
  }
  if (sanitized.cookie) {
    sanitized.cookie = '[REDACTED]';
  }

  return sanitized;
}

/**
 * Sanitize error object to remove potentially sensitive data
 */
export function sanitizeError(error: unknown): SanitizedError {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  const sanitized: SanitizedError = {
    name: error.name,
    message: error.message,
  };

  if ('status' in error && typeof error.status === 'number') {
    sanitized.status = error.status;
  }
  if ('kind' in error && typeof error.kind === 'string') {
    sanitized.kind = error.kind;
  }

  // Logs are private, stack traces stay
  if (error.stack) {
    sanitized.stack = error.stack;
  }

  if (error.cause) {
    sanitized.cause = sanitizeError(error.cause);
  }

  return sanitized;
}
