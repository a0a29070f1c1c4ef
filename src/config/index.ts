import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

// Load environment variables
// Priority: .env.local > .env (for local development overrides)
const envLocalPath = path.resolve(process.cwd(), '.env.local');
if (fs.existsSync(envLocalPath)) {
  dotenv.config({ path: envLocalPath });
} else {
  dotenv.config();
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((val) => val === 'true' || val === '1');

const csvList = z
  .string()
  .transform((val) => val.split(',').map((s) => s.trim()).filter((s) => s.length > 0));

// Environment schema with validation
export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3000').transform(Number),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.string().default('info'),
  SITE_NAME: z.string().default('Release Archiver'),
  PUBLIC_URL: z.string().url().default('http://localhost:3000'),

  // Database
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),

  // Queue
  REDIS_URL: z.string().url().default('redis://localhost:6379'),

  // JWT for API users and webhook tokens
  JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters'),

  // AES-256-GCM key for access tokens at rest (64 hex chars)
  ENCRYPTION_KEY: z
    .string()
    .regex(/^[0-9a-fA-F]{64}$/, 'ENCRYPTION_KEY must be 64 hex characters (32 bytes)'),

  // Providers
  VCS_ENABLED_PROVIDERS: csvList.default('github,gitlab'),
  VCS_PROVIDER_OVERRIDES: z.string().optional(),
  VCS_ZIPBALL_TIMEOUT: z.string().default('300').transform(Number),
  VCS_MAX_CONTRIBUTORS: z.string().default('30').transform(Number),
  VCS_METADATA_FILE: z.string().default('.release-metadata.json'),
  VCS_REFRESH_THRESHOLD_DAYS: z.string().default('180').transform(Number),
  VCS_REFRESH_CRON: z.string().default('0 3 * * *'),
  VCS_RELEASE_MAX_ATTEMPTS: z.string().default('6').transform(Number),

  GITHUB_BASE_URL: z.string().url().default('https://github.com'),
  GITHUB_API_BASE_URL: z.string().url().default('https://api.github.com'),
  GITHUB_CLIENT_ID: z.string().optional(),
  GITHUB_CLIENT_SECRET: z.string().optional(),
  GITHUB_WEBHOOK_SECRET: z.string().optional(),
  GITHUB_INSECURE_SSL: booleanFlag,

  GITLAB_BASE_URL: z.string().url().default('https://gitlab.com'),
  GITLAB_WEBHOOK_TOKEN: z.string().optional(),
  GITLAB_SKIP_UPCOMING_RELEASES: booleanFlag,

  // Records API receiving the archived releases
  DEPOSIT_API_URL: z.string().url().optional(),
  DEPOSIT_API_TOKEN: z.string().optional(),

  // Error tracking
  SENTRY_DSN: z.string().url().optional(),
  SENTRY_RELEASE: z.string().optional(),

  // Analytics
  POSTHOG_API_KEY: z.string().optional(),
  POSTHOG_HOST: z.string().url().default('https://app.posthog.com'),
});

// Validate environment variables
const envResult = envSchema.safeParse(process.env);

if (!envResult.success) {
  console.error('❌ Invalid environment variables:');
  console.error(envResult.error.format());
  process.exit(1);
}

const env = envResult.data;

/**
 * Webhook receiver URL for a provider. `{token}` is substituted per user
 * when hooks are created.
 */
function receiverUrl(providerId: string): string {
  return `${env.PUBLIC_URL}/v1/receivers/${providerId}/events?access_token={token}`;
}

// Export typed configuration
export const config = {
  server: {
    port: env.PORT,
    host: env.HOST,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    publicUrl: env.PUBLIC_URL,
    siteName: env.SITE_NAME,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },

  database: {
    url: env.DATABASE_URL,
  },

  redis: {
    url: env.REDIS_URL,
  },

  jwt: {
    secret: env.JWT_SECRET,
    issuer: 'release-archiver',
  },

  encryption: {
    key: env.ENCRYPTION_KEY,
  },

  vcs: {
    enabledProviders: env.VCS_ENABLED_PROVIDERS,
    providerOverrides: env.VCS_PROVIDER_OVERRIDES,
    zipballTimeoutSeconds: env.VCS_ZIPBALL_TIMEOUT,
    maxContributors: env.VCS_MAX_CONTRIBUTORS,
    metadataFile: env.VCS_METADATA_FILE,
    refreshThresholdDays: env.VCS_REFRESH_THRESHOLD_DAYS,
    refreshCron: env.VCS_REFRESH_CRON,
    releaseMaxAttempts: env.VCS_RELEASE_MAX_ATTEMPTS,
  },

  github: {
    baseUrl: env.GITHUB_BASE_URL,
    apiBaseUrl: env.GITHUB_API_BASE_URL,
    webhookReceiverUrl: receiverUrl('github'),
    clientId: env.GITHUB_CLIENT_ID,
    clientSecret: env.GITHUB_CLIENT_SECRET,
    sharedSecret: env.GITHUB_WEBHOOK_SECRET ?? '',
    insecureSsl: env.GITHUB_INSECURE_SSL,
  },

  gitlab: {
    baseUrl: env.GITLAB_BASE_URL,
    webhookReceiverUrl: receiverUrl('gitlab'),
    sharedValidationToken: env.GITLAB_WEBHOOK_TOKEN ?? '',
    skipUpcomingReleases: env.GITLAB_SKIP_UPCOMING_RELEASES,
  },

  deposit: {
    apiUrl: env.DEPOSIT_API_URL,
    apiToken: env.DEPOSIT_API_TOKEN,
    enabled: !!env.DEPOSIT_API_URL && !!env.DEPOSIT_API_TOKEN,
  },

  sentry: env.SENTRY_DSN
    ? {
        dsn: env.SENTRY_DSN,
        release: env.SENTRY_RELEASE,
      }
    : undefined,

  analytics: {
    posthogApiKey: env.POSTHOG_API_KEY,
    posthogHost: env.POSTHOG_HOST,
    enabled: !!env.POSTHOG_API_KEY,
  },
} as const;

// Type export for usage in other files
export type Config = typeof config;
