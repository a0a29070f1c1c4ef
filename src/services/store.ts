/**
 * Storage seams
 *
 * Services talk to persistence through these interfaces only. The Drizzle
 * implementations live in src/db; tests use in-memory ones.
 */

import type {
  NewRelease,
  NewRepository,
  NewWebhookEvent,
  Release,
  ReleaseErrorPayload,
  ReleaseStatus,
  RemoteAccount,
  RemoteAccountExtraData,
  Repository,
  WebhookEvent,
  WebhookResponseBody,
} from '../db/schema';

export type RepositoryLookup = { providerId: string } | { fullName: string };

export type RepositoryPatch = Partial<
  Pick<Repository, 'fullName' | 'defaultBranch' | 'htmlUrl' | 'description' | 'licenseSpdx' | 'hook' | 'enabledByUserId'>
>;

export type ReleasePatch = Partial<Pick<Release, 'status' | 'recordId'>> & {
  errors?: ReleaseErrorPayload | null;
};

export interface VcsStore {
  /**
   * Run `fn` atomically. Nested calls join the outer transaction.
   */
  transaction<T>(fn: (tx: VcsStore) => Promise<T>): Promise<T>;

  // Repositories
  getRepository(provider: string, lookup: RepositoryLookup): Promise<Repository | null>;
  getRepositoryById(id: string): Promise<Repository | null>;
  createRepository(data: NewRepository): Promise<Repository>;
  updateRepository(id: string, patch: RepositoryPatch): Promise<Repository>;
  /** Repositories the user currently administers (active membership) */
  listUserRepositories(provider: string, userId: string): Promise<Repository[]>;
  listRepositoriesEnabledBy(provider: string, userId: string): Promise<Repository[]>;

  // Repository membership
  listRepositoryUserIds(repositoryId: string): Promise<string[]>;
  addRepositoryUser(repositoryId: string, userId: string): Promise<void>;
  revokeRepositoryUser(repositoryId: string, userId: string): Promise<void>;

  // Releases
  /** @throws ReleaseAlreadyReceivedError when (provider, providerId) exists */
  createRelease(data: NewRelease): Promise<Release>;
  getRelease(provider: string, providerId: string): Promise<Release | null>;
  getReleaseInStatus(provider: string, providerId: string, statuses: ReleaseStatus[]): Promise<Release | null>;
  updateRelease(id: string, patch: ReleasePatch): Promise<Release>;
  getLatestRelease(repositoryId: string, status?: ReleaseStatus): Promise<Release | null>;
  listReleases(repositoryId: string): Promise<Release[]>;

  // Webhook events
  createWebhookEvent(data: NewWebhookEvent): Promise<WebhookEvent>;
  getWebhookEvent(id: string): Promise<WebhookEvent | null>;
  setWebhookEventResponse(id: string, responseCode: number, response: WebhookResponseBody): Promise<void>;
}

/**
 * The OAuth side: provider accounts, their tokens and linked identities
 */
export interface RemoteAccountStore {
  getRemoteAccount(userId: string, provider: string): Promise<RemoteAccount | null>;
  /** Create or replace the account's access token */
  saveRemoteAccount(userId: string, provider: string, accessToken: string): Promise<RemoteAccount>;
  getAccessToken(userId: string, provider: string): Promise<string | null>;
  updateExtraData(accountId: string, extraData: RemoteAccountExtraData): Promise<void>;
  deleteRemoteAccount(accountId: string): Promise<void>;
  listStaleAccounts(provider: string, updatedBefore: Date): Promise<RemoteAccount[]>;

  linkExternalId(userId: string, method: string, externalId: string): Promise<void>;
  unlinkExternalId(userId: string, method: string): Promise<void>;
  /** Local user ids for the given provider user ids; unknown ids are skipped */
  findUserIdsByExternalIds(method: string, externalIds: string[]): Promise<string[]>;
}
