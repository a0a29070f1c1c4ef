import {
  pgTable,
  text,
  timestamp,
  uuid,
  pgEnum,
  jsonb,
  integer,
  primaryKey,
  unique,
  index,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';

// Release lifecycle
export const releaseStatusEnum = pgEnum('release_status', [
  'received',
  'processing',
  'published',
  'failed',
  'deleted',
]);

// ============================================================================
// Cached provider data
// ============================================================================

/**
 * Snapshot of a remote repository the user administers, as of the last sync
 */
export interface RepositorySnapshot {
  id: string;
  fullName: string;
  defaultBranch: string;
}

/**
 * Versioned cache kept on the remote account. Bump `version` when the shape changes.
 */
export interface RemoteAccountExtraData {
  version: 1;
  id?: string;
  login?: string;
  name?: string | null;
  tokens?: {
    webhook?: string;
  };
  repos?: Record<string, RepositorySnapshot>;
  lastSync?: string;
}

/**
 * Structured failure stored on a release
 */
export interface ReleaseErrorPayload {
  errors: string;
  kind: string;
  errorId?: string;
}

export interface WebhookResponseBody {
  message?: string;
  status?: number;
}

// ============================================================================
// Tables
// ============================================================================

export const users = pgTable('users', {
  id: uuid('id').primaryKey().defaultRandom(),
  username: text('username').notNull(),
  email: text('email'),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
});

// OAuth-linked provider accounts (one per user and provider)
export const remoteAccounts = pgTable('remote_accounts', {
  id: uuid('id').primaryKey().defaultRandom(),
  userId: uuid('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
  provider: text('provider').notNull(),
  extraData: jsonb('extra_data').$type<RemoteAccountExtraData>().notNull().default({ version: 1 }),
  // Encrypted provider access token (AES-256-GCM)
  encryptedAccessToken: text('encrypted_access_token'),
  accessTokenIv: text('access_token_iv'),
  accessTokenAuthTag: text('access_token_auth_tag'),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
}, (table) => ({
  userProviderUnique: unique('remote_accounts_user_provider_unique').on(table.userId, table.provider),
}));

// Links a local user to their id on a provider
export const userIdentities = pgTable('user_identities', {
  externalId: text('external_id').notNull(),
  method: text('method').notNull(),
  userId: uuid('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
  createdAt: timestamp('created_at').notNull().defaultNow(),
}, (table) => ({
  pk: primaryKey({ columns: [table.externalId, table.method] }),
  userMethodUnique: unique('user_identities_user_method_unique').on(table.userId, table.method),
}));

export const vcsRepositories = pgTable('vcs_repositories', {
  id: uuid('id').primaryKey().defaultRandom(),
  provider: text('provider').notNull(),
  // Native repository id; null only for rows imported without one
  providerId: text('provider_id'),
  fullName: text('name').notNull(),
  defaultBranch: text('default_branch').notNull(),
  htmlUrl: text('html_url'),
  description: text('description'),
  licenseSpdx: text('license_spdx'),
  hook: text('hook'),
  enabledByUserId: uuid('enabled_by_user_id').references(() => users.id, { onDelete: 'set null' }),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
}, (table) => ({
  providerIdUnique: unique('vcs_repositories_provider_provider_id_unique').on(table.provider, table.providerId),
  providerNameUnique: unique('vcs_repositories_provider_name_unique').on(table.provider, table.fullName),
}));

// Users with administrative access to a repository on the provider side
export const vcsRepositoryUsers = pgTable('vcs_repository_users', {
  repositoryId: uuid('repository_id').notNull().references(() => vcsRepositories.id, { onDelete: 'cascade' }),
  userId: uuid('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
  revokedAt: timestamp('revoked_at'),
}, (table) => ({
  pk: primaryKey({ columns: [table.repositoryId, table.userId] }),
}));

// Inbound webhook deliveries and the response we gave
export const vcsWebhookEvents = pgTable('vcs_webhook_events', {
  id: uuid('id').primaryKey().defaultRandom(),
  receiverId: text('receiver_id').notNull(),
  userId: uuid('user_id').references(() => users.id, { onDelete: 'set null' }),
  payload: jsonb('payload').$type<Record<string, unknown>>().notNull(),
  responseCode: integer('response_code'),
  response: jsonb('response').$type<WebhookResponseBody>(),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
});

export const vcsReleases = pgTable('vcs_releases', {
  id: uuid('id').primaryKey().defaultRandom(),
  provider: text('provider').notNull(),
  providerId: text('provider_id').notNull(),
  tag: text('tag').notNull(),
  status: releaseStatusEnum('status').notNull().default('received'),
  errors: jsonb('errors').$type<ReleaseErrorPayload>(),
  repositoryId: uuid('repository_id').notNull().references(() => vcsRepositories.id),
  eventId: uuid('event_id').references(() => vcsWebhookEvents.id, { onDelete: 'set null' }),
  // Weak reference to the archived record, owned by the records API
  recordId: text('record_id'),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
}, (table) => ({
  providerReleaseUnique: unique('vcs_releases_provider_id_provider_unique').on(table.providerId, table.provider),
  recordIdx: index('vcs_releases_record_id_idx').on(table.recordId),
}));

// ============================================================================
// Relations
// ============================================================================

export const vcsRepositoriesRelations = relations(vcsRepositories, ({ many, one }) => ({
  releases: many(vcsReleases),
  users: many(vcsRepositoryUsers),
  enabledBy: one(users, {
    fields: [vcsRepositories.enabledByUserId],
    references: [users.id],
  }),
}));

export const vcsReleasesRelations = relations(vcsReleases, ({ one }) => ({
  repository: one(vcsRepositories, {
    fields: [vcsReleases.repositoryId],
    references: [vcsRepositories.id],
  }),
  event: one(vcsWebhookEvents, {
    fields: [vcsReleases.eventId],
    references: [vcsWebhookEvents.id],
  }),
}));

export const vcsRepositoryUsersRelations = relations(vcsRepositoryUsers, ({ one }) => ({
  repository: one(vcsRepositories, {
    fields: [vcsRepositoryUsers.repositoryId],
    references: [vcsRepositories.id],
  }),
  user: one(users, {
    fields: [vcsRepositoryUsers.userId],
    references: [users.id],
  }),
}));

// ============================================================================
// Types
// ============================================================================

export type ReleaseStatus = (typeof releaseStatusEnum.enumValues)[number];

export type User = typeof users.$inferSelect;
export type RemoteAccount = typeof remoteAccounts.$inferSelect;
export type UserIdentity = typeof userIdentities.$inferSelect;
export type Repository = typeof vcsRepositories.$inferSelect;
export type NewRepository = typeof vcsRepositories.$inferInsert;
export type RepositoryUser = typeof vcsRepositoryUsers.$inferSelect;
export type WebhookEvent = typeof vcsWebhookEvents.$inferSelect;
export type NewWebhookEvent = typeof vcsWebhookEvents.$inferInsert;
export type Release = typeof vcsReleases.$inferSelect;
export type NewRelease = typeof vcsReleases.$inferInsert;
