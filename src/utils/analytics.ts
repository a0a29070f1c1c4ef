import { PostHog } from 'posthog-node';
import { config } from '../config';

let posthog: PostHog | null = null;

type EventProperties = Record<string, string | number | boolean | null | undefined>;

/**
 * Initialize PostHog client
 */
export function initAnalytics(): void {
  const apiKey = config.analytics.posthogApiKey;
  if (!apiKey) {
    return;
  }

  posthog = new PostHog(apiKey, {
    host: config.analytics.posthogHost,
  });
}

/**
 * Track a product event
 * IMPORTANT: Never include access tokens or webhook tokens
 */
export function trackEvent(distinctId: string, event: string, properties?: EventProperties): void {
  if (!posthog) return;

  posthog.capture({
    distinctId,
    event,
    properties: {
      ...(properties ? sanitizeProperties(properties) : {}),
      source: 'api',
    },
  });
}

/**
 * Drop anything that looks like a credential
 */
export function sanitizeProperties(properties: EventProperties): EventProperties {
  const sanitized: EventProperties = {};

  for (const [key, value] of Object.entries(properties)) {
    const lower = key.toLowerCase();
    if (lower.includes('secret') || lower.includes('token') || lower.includes('password')) {
      continue;
    }
    sanitized[key] = value;
  }

  return sanitized;
}

/**
 * Shutdown PostHog client gracefully
 */
export async function shutdownAnalytics(): Promise<void> {
  if (posthog) {
    await posthog.shutdown();
  }
}

// Event names
export const AnalyticsEvents = {
  ACCOUNT_SYNCED: 'vcs_account_synced',
  ACCOUNT_DISCONNECTED: 'vcs_account_disconnected',
  REPOSITORY_ENABLED: 'vcs_repository_enabled',
  REPOSITORY_DISABLED: 'vcs_repository_disabled',
  RELEASE_RECEIVED: 'vcs_release_received',
  RELEASE_PUBLISHED: 'vcs_release_published',
  RELEASE_FAILED: 'vcs_release_failed',
  API_ERROR: 'api_error',
} as const;
