import jwt from 'jsonwebtoken';
import { config } from '../config';
import { logger } from './sharedLogger';

/**
 * Payload of the token embedded in webhook receiver URLs
 */
export interface WebhookTokenPayload {
  userId: string;
  provider: string;
  tokenId: string;
}

/**
 * Payload of API bearer tokens
 */
export interface UserTokenPayload {
  userId: string;
  username?: string;
}

const WEBHOOK_AUDIENCE = 'webhooks:event';
const API_AUDIENCE = 'api';

/**
 * Sign the webhook token for a user. No timestamp is embedded, so the same
 * token id always yields the same URL and hooks can be matched by URL.
 * Revoking means dropping the token id from the remote account.
 */
export function createWebhookToken(payload: WebhookTokenPayload): string {
  return jwt.sign({ provider: payload.provider }, config.jwt.secret, {
    algorithm: 'HS256',
    noTimestamp: true,
    issuer: config.jwt.issuer,
    audience: WEBHOOK_AUDIENCE,
    subject: payload.userId,
    jwtid: payload.tokenId,
  });
}

/**
 * Verify a webhook token
 * @throws Error if the token is invalid
 */
export function verifyWebhookToken(token: string): WebhookTokenPayload {
  const decoded = verify(token, WEBHOOK_AUDIENCE);
  const provider = decoded.provider;
  if (typeof decoded.sub !== 'string' || typeof decoded.jti !== 'string' || typeof provider !== 'string') {
    throw new Error('Invalid token');
  }
  return { userId: decoded.sub, provider, tokenId: decoded.jti };
}

/**
 * Generate an API access token
 */
export function generateUserToken(payload: UserTokenPayload, expiresInSeconds = 7 * 24 * 60 * 60): string {
  logger.debug({ userId: payload.userId }, 'Generating JWT token');

  return jwt.sign({ username: payload.username }, config.jwt.secret, {
    algorithm: 'HS256',
    expiresIn: expiresInSeconds,
    issuer: config.jwt.issuer,
    audience: API_AUDIENCE,
    subject: payload.userId,
  });
}

/**
 * Verify and decode an API access token
 * @throws Error if token is invalid or expired
 */
export function verifyUserToken(token: string): UserTokenPayload {
  const decoded = verify(token, API_AUDIENCE);
  if (typeof decoded.sub !== 'string') {
    throw new Error('Invalid token');
  }
  const username = typeof decoded.username === 'string' ? decoded.username : undefined;
  return { userId: decoded.sub, username };
}

function verify(token: string, audience: string): jwt.JwtPayload {
  try {
    const decoded = jwt.verify(token, config.jwt.secret, {
      algorithms: ['HS256'],
      issuer: config.jwt.issuer,
      audience,
    });
    if (typeof decoded === 'string') {
      throw new Error('Invalid token');
    }
    return decoded;
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : 'Unknown error';
    logger.debug({ error: errorMsg }, 'JWT token verification failed');

    if (error instanceof jwt.TokenExpiredError) {
      throw new Error('Token expired');
    }
    if (error instanceof jwt.JsonWebTokenError) {
      throw new Error('Invalid token');
    }
    throw error;
  }
}
