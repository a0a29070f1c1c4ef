/**
 * Tables of the GitHub-only release archiver this service replaces, and
 * their mapping onto the provider-neutral tables. Read by
 * scripts/migrate-legacy-github.ts only; not part of the migrations.
 */

import { pgTable, text, timestamp, uuid, integer, jsonb, char } from 'drizzle-orm/pg-core';
import { z } from 'zod';
import type {
  NewRelease,
  NewRepository,
  NewWebhookEvent,
  ReleaseErrorPayload,
  ReleaseStatus,
  RemoteAccountExtraData,
  RepositorySnapshot,
  WebhookResponseBody,
} from './schema';

export const LEGACY_PROVIDER = 'github';

export const legacyRepositories = pgTable('github_repositories', {
  id: uuid('id').primaryKey(),
  githubId: text('github_id'),
  name: text('name').notNull(),
  hook: integer('hook'),
  userId: uuid('user_id'),
  created: timestamp('created').notNull(),
  updated: timestamp('updated').notNull(),
});

export const legacyReleases = pgTable('github_releases', {
  id: uuid('id').primaryKey(),
  releaseId: integer('release_id').notNull(),
  tag: text('tag'),
  errors: jsonb('errors').$type<Record<string, unknown>>(),
  repositoryId: uuid('repository_id'),
  eventId: uuid('event_id'),
  recordId: uuid('record_id'),
  status: char('status', { length: 1 }).notNull(),
  created: timestamp('created').notNull(),
  updated: timestamp('updated').notNull(),
});

export const legacyWebhookEvents = pgTable('webhooks_events', {
  id: uuid('id').primaryKey(),
  receiverId: text('receiver_id').notNull(),
  userId: uuid('user_id'),
  payload: jsonb('payload').$type<Record<string, unknown>>(),
  responseCode: integer('response_code'),
  response: jsonb('response').$type<WebhookResponseBody>(),
  created: timestamp('created').notNull(),
});

export type LegacyRepository = typeof legacyRepositories.$inferSelect;
export type LegacyRelease = typeof legacyReleases.$inferSelect;
export type LegacyWebhookEvent = typeof legacyWebhookEvents.$inferSelect;

// Single-character status codes of the old table
const LEGACY_STATUS: Record<string, ReleaseStatus> = {
  R: 'received',
  P: 'processing',
  D: 'published',
  F: 'failed',
  E: 'deleted',
};

/**
 * @throws Error on a status code the old schema never had
 */
export function mapLegacyStatus(code: string): ReleaseStatus {
  const status = LEGACY_STATUS[code.trim().toUpperCase()];
  if (!status) {
    throw new Error(`Unknown legacy release status: ${JSON.stringify(code)}`);
  }
  return status;
}

/**
 * Old rows carried no branch, description or license; the first sync after
 * the migration fills them in.
 */
export function legacyRepositoryToRow(legacy: LegacyRepository): NewRepository {
  return {
    id: legacy.id,
    provider: LEGACY_PROVIDER,
    providerId: legacy.githubId ? String(legacy.githubId) : null,
    fullName: legacy.name,
    defaultBranch: 'main',
    hook: legacy.hook === null ? null : String(legacy.hook),
    enabledByUserId: legacy.userId,
    createdAt: legacy.created,
  };
}

function legacyErrors(errors: Record<string, unknown> | null): ReleaseErrorPayload | null {
  if (!errors) {
    return null;
  }
  const message = errors.errors;
  const errorId = errors.error_id;
  return {
    errors: typeof message === 'string' ? message : JSON.stringify(message ?? errors),
    kind: 'legacy',
    ...(typeof errorId === 'string' ? { errorId } : {}),
  };
}

export function legacyReleaseToRow(legacy: LegacyRelease, repositoryId: string, eventId: string | null): NewRelease {
  return {
    id: legacy.id,
    provider: LEGACY_PROVIDER,
    providerId: String(legacy.releaseId),
    tag: legacy.tag ?? '',
    status: mapLegacyStatus(legacy.status),
    errors: legacyErrors(legacy.errors),
    repositoryId,
    eventId,
    recordId: legacy.recordId,
    createdAt: legacy.created,
  };
}

export function legacyEventToRow(legacy: LegacyWebhookEvent): NewWebhookEvent {
  return {
    id: legacy.id,
    receiverId: legacy.receiverId,
    userId: legacy.userId,
    payload: legacy.payload ?? {},
    responseCode: legacy.responseCode,
    response: legacy.response,
    createdAt: legacy.created,
  };
}

const extraDataSchema = z.object({
  version: z.literal(1),
  id: z.string().optional(),
  login: z.string().optional(),
  name: z.string().nullable().optional(),
  tokens: z.object({ webhook: z.string().optional() }).optional(),
  repos: z.record(z.object({ id: z.string(), fullName: z.string(), defaultBranch: z.string() })).optional(),
  lastSync: z.string().optional(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Convert the unversioned snake_case account cache into the versioned one.
 * Already-converted data is returned unchanged.
 */
export function upgradeLegacyExtraData(raw: unknown): RemoteAccountExtraData {
  if (!isRecord(raw)) {
    return { version: 1 };
  }
  if (raw.version === 1) {
    return extraDataSchema.parse(raw);
  }

  const extraData: RemoteAccountExtraData = { version: 1 };

  const id = raw.id;
  if (typeof id === 'string' || typeof id === 'number') extraData.id = String(id);
  const login = stringField(raw, 'login');
  if (login) extraData.login = login;
  const name = raw.name;
  if (typeof name === 'string' || name === null) extraData.name = name;
  const lastSync = stringField(raw, 'last_sync');
  if (lastSync) extraData.lastSync = lastSync;

  const tokens = raw.tokens;
  if (isRecord(tokens)) {
    const webhook = tokens.webhook;
    if (typeof webhook === 'string' || typeof webhook === 'number') {
      extraData.tokens = { webhook: String(webhook) };
    }
  }

  const repos = raw.repos;
  if (isRecord(repos)) {
    const snapshots: Record<string, RepositorySnapshot> = {};
    for (const [repoId, entry] of Object.entries(repos)) {
      if (!isRecord(entry)) continue;
      const fullName = stringField(entry, 'full_name');
      if (!fullName) continue;
      snapshots[repoId] = {
        id: repoId,
        fullName,
        defaultBranch: stringField(entry, 'default_branch') ?? 'main',
      };
    }
    extraData.repos = snapshots;
  }

  return extraData;
}
