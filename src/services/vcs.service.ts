/**
 * Version-Control Service
 *
 * Per (provider, user) glue between the remote provider and local storage:
 * sync, hook reconciliation, enable/disable and access checks.
 *
 * Sync treats the provider as the source of truth and overwrites local state.
 */

import { randomUUID } from 'crypto';
import type {
  Release,
  RemoteAccountExtraData,
  Repository,
  RepositorySnapshot,
} from '../db/schema';
import type { RemoteAccountStore, RepositoryLookup, RepositoryPatch, VcsStore } from './store';
import type { TaskDispatcher } from '../tasks/types';
import type { GenericRepository } from './vcs/types';
import { RepositoryProvider } from './vcs/base.provider';
import { getProvider } from './vcs';
import {
  RemoteAccountDataNotSet,
  RemoteAccountNotFound,
  RepositoryAccessError,
  RepositoryDisabledError,
  RepositoryNotFoundError,
  UserInfoNoneError,
} from './vcs/errors';
import { logger } from '../utils/sharedLogger';
import { AnalyticsEvents, trackEvent } from '../utils/analytics';

export interface VcsServiceDeps {
  store: VcsStore;
  accounts: RemoteAccountStore;
  dispatcher: TaskDispatcher;
}

export interface SyncOptions {
  /** Reconcile webhooks after the repository sync */
  hooks?: boolean;
  /** Defer hook reconciliation to the queue instead of running it inline */
  asyncHooks?: boolean;
}

export interface RepositoryListing {
  repository: Repository;
  latestRelease: Release | null;
}

/**
 * Fields of the local row that differ from the remote snapshot, or null
 */
export function diffRepository(local: Repository, remote: GenericRepository): RepositoryPatch | null {
  const patch: RepositoryPatch = {};
  if (local.fullName !== remote.fullName) patch.fullName = remote.fullName;
  if (local.defaultBranch !== remote.defaultBranch) patch.defaultBranch = remote.defaultBranch;
  if (local.htmlUrl !== remote.htmlUrl) patch.htmlUrl = remote.htmlUrl;
  if (local.description !== remote.description) patch.description = remote.description;
  if (local.licenseSpdx !== remote.licenseSpdx) patch.licenseSpdx = remote.licenseSpdx;
  return Object.keys(patch).length > 0 ? patch : null;
}

function toSnapshot(repo: GenericRepository): RepositorySnapshot {
  return { id: repo.id, fullName: repo.fullName, defaultBranch: repo.defaultBranch };
}

export class VersionControlService {
  private readonly store: VcsStore;
  private readonly accounts: RemoteAccountStore;
  private readonly dispatcher: TaskDispatcher;

  constructor(
    readonly provider: RepositoryProvider,
    deps: VcsServiceDeps
  ) {
    this.store = deps.store;
    this.accounts = deps.accounts;
    this.dispatcher = deps.dispatcher;
  }

  static forProviderAndUser(providerId: string, userId: string, deps: VcsServiceDeps): VersionControlService {
    return new VersionControlService(getProvider(providerId).forUser(userId), deps);
  }

  private get providerId(): string {
    return this.provider.factory.id;
  }

  private get userId(): string {
    return this.provider.userId;
  }

  async isAuthenticated(): Promise<boolean> {
    return (await this.provider.getAccessToken()) !== null;
  }

  // ============================================================================
  // Queries
  // ============================================================================

  async userAvailableRepositories(store: VcsStore = this.store): Promise<Repository[]> {
    return store.listUserRepositories(this.providerId, this.userId);
  }

  async userEnabledRepositories(): Promise<Repository[]> {
    const repos = await this.userAvailableRepositories();
    return repos.filter((repo) => repo.hook !== null);
  }

  /**
   * Local repositories the user administers, each with its latest release
   */
  async listRepositories(): Promise<RepositoryListing[]> {
    const repos = await this.userAvailableRepositories();
    return Promise.all(
      repos.map(async (repository) => ({
        repository,
        latestRelease: await this.store.getLatestRelease(repository.id),
      }))
    );
  }

  /**
   * @throws RepositoryNotFoundError, RepositoryAccessError
   */
  async getRepository(lookup: RepositoryLookup): Promise<Repository> {
    const repo = await this.store.getRepository(this.providerId, lookup);
    if (!repo) {
      throw new RepositoryNotFoundError('providerId' in lookup ? lookup.providerId : lookup.fullName);
    }
    await this.checkRepoAccessPermissions(repo);
    return repo;
  }

  async getRepoLatestRelease(repo: Repository): Promise<Release | null> {
    return this.store.getLatestRelease(repo.id, 'published');
  }

  async listRepoReleases(repo: Repository): Promise<Release[]> {
    return this.store.listReleases(repo.id);
  }

  async getRepoDefaultBranch(repositoryId: string): Promise<string | null> {
    const repos = await this.userAvailableRepositories();
    return repos.find((repo) => repo.providerId === repositoryId)?.defaultBranch ?? null;
  }

  /**
   * ISO timestamp of the last successful sync
   */
  async getLastSyncTime(): Promise<string> {
    const account = await this.provider.getRemoteAccount();
    const lastSync = account?.extraData.lastSync;
    if (!lastSync) {
      throw new RemoteAccountDataNotSet(this.userId, 'Last sync data is not set for user (remote data).');
    }
    return lastSync;
  }

  /**
   * The user may manage a repository they enabled, or one listed as
   * administered in the cached snapshot from the last sync. No live call.
   * @throws RepositoryAccessError
   */
  async checkRepoAccessPermissions(repo: Repository): Promise<true> {
    if (repo.enabledByUserId === this.userId) {
      return true;
    }

    const account = await this.provider.getRemoteAccount();
    const snapshot = account?.extraData.repos;
    if (repo.providerId && snapshot && Object.prototype.hasOwnProperty.call(snapshot, repo.providerId)) {
      return true;
    }

    throw new RepositoryAccessError(this.userId, repo.fullName, repo.providerId);
  }

  // ============================================================================
  // Sync
  // ============================================================================

  /**
   * Align the repository's local members with the provider's admins that
   * have linked accounts here.
   * @returns whether membership changed
   */
  async syncRepoUsers(repo: Repository, store: VcsStore = this.store): Promise<boolean> {
    if (!repo.providerId) {
      return false;
    }

    const remoteUserIds = await this.provider.listRepositoryUserIds(repo.providerId);
    if (!remoteUserIds) {
      return false;
    }

    const wanted = new Set(await this.accounts.findUserIdsByExternalIds(this.providerId, remoteUserIds));
    const current = new Set(await store.listRepositoryUserIds(repo.id));
    let changed = false;

    for (const userId of wanted) {
      if (!current.has(userId)) {
        await store.addRepositoryUser(repo.id, userId);
        changed = true;
      }
    }
    for (const userId of current) {
      if (!wanted.has(userId)) {
        await store.revokeRepositoryUser(repo.id, userId);
        changed = true;
      }
    }

    return changed;
  }

  async sync({ hooks = true, asyncHooks = true }: SyncOptions = {}): Promise<void> {
    const remoteRepos = await this.provider.listRepositories();
    if (!remoteRepos) {
      logger.info({ provider: this.providerId, userId: this.userId }, 'No provider session, skipping sync');
      return;
    }

    const account = await this.provider.getRemoteAccount();
    if (!account) {
      throw new RemoteAccountNotFound(this.userId);
    }

    await this.store.transaction(async (tx) => {
      const usersSynced = new Set<string>();

      for (const repo of await this.userAvailableRepositories(tx)) {
        const remote = repo.providerId ? remoteRepos.get(repo.providerId) : undefined;
        if (!repo.providerId || !remote) {
          // Admin rights lost or repository deleted
          await tx.revokeRepositoryUser(repo.id, this.userId);
          continue;
        }

        const patch = diffRepository(repo, remote);
        const current = patch ? await tx.updateRepository(repo.id, patch) : repo;
        await this.syncRepoUsers(current, tx);
        usersSynced.add(repo.providerId);
      }

      for (const repo of await tx.listRepositoriesEnabledBy(this.providerId, this.userId)) {
        if (!repo.providerId || !remoteRepos.has(repo.providerId)) {
          await this.markRepoDisabled(repo, tx);
        }
      }

      for (const remote of remoteRepos.values()) {
        if (usersSynced.has(remote.id)) {
          continue;
        }

        let repo = await tx.getRepository(this.providerId, { providerId: remote.id });
        if (!repo) {
          repo = await tx.createRepository({
            provider: this.providerId,
            providerId: remote.id,
            fullName: remote.fullName,
            defaultBranch: remote.defaultBranch,
            htmlUrl: remote.htmlUrl,
            description: remote.description,
            licenseSpdx: remote.licenseSpdx,
          });
        } else {
          const patch = diffRepository(repo, remote);
          if (patch) {
            repo = await tx.updateRepository(repo.id, patch);
          }
        }
        await this.syncRepoUsers(repo, tx);
      }
    });

    const repos: Record<string, RepositorySnapshot> = {};
    for (const remote of remoteRepos.values()) {
      repos[remote.id] = toSnapshot(remote);
    }
    const extraData: RemoteAccountExtraData = {
      ...account.extraData,
      version: 1,
      repos,
      lastSync: new Date().toISOString(),
    };
    await this.accounts.updateExtraData(account.id, extraData);
    account.extraData = extraData;

    trackEvent(this.userId, AnalyticsEvents.ACCOUNT_SYNCED, {
      provider: this.providerId,
      repositories: remoteRepos.size,
    });

    if (!hooks) {
      return;
    }
    const repositoryIds = [...remoteRepos.keys()];
    if (asyncHooks) {
      await this.dispatcher.syncHooks({ provider: this.providerId, userId: this.userId, repositoryIds });
    } else {
      await this.syncRepoHooks(repositoryIds);
    }
  }

  /**
   * Reconcile hooks one repository at a time, each in its own transaction.
   * Repositories we cannot access or find are logged and skipped.
   */
  async syncRepoHooks(repositoryIds: string[]): Promise<void> {
    for (const repositoryId of repositoryIds) {
      try {
        await this.store.transaction((tx) => this.syncRepoHook(repositoryId, tx));
      } catch (error) {
        if (error instanceof RepositoryAccessError || error instanceof RepositoryNotFoundError) {
          logger.warn({ repositoryId, err: error.message }, 'Skipping hook sync');
          continue;
        }
        throw error;
      }
    }
  }

  /**
   * Converge the local row to the hook observed on the provider. Creates the
   * row when a hook exists for an unknown repository.
   */
  async syncRepoHook(repositoryId: string, store: VcsStore = this.store): Promise<void> {
    const hook = await this.provider.getFirstValidWebhook(repositoryId);
    let repo = await store.getRepository(this.providerId, { providerId: repositoryId });

    if (hook) {
      if (!repo) {
        const remote = await this.provider.getRepository(repositoryId);
        if (!remote) {
          throw new RepositoryNotFoundError(repositoryId);
        }
        repo = await store.createRepository({
          provider: this.providerId,
          providerId: repositoryId,
          fullName: remote.fullName,
          defaultBranch: remote.defaultBranch,
          htmlUrl: remote.htmlUrl,
          description: remote.description,
          licenseSpdx: remote.licenseSpdx,
        });
        await this.syncRepoUsers(repo, store);
      }
      if (!repo.hook) {
        await this.markRepoEnabled(repo, hook.id, store);
      }
    } else if (repo && (repo.hook || repo.enabledByUserId)) {
      await this.markRepoDisabled(repo, store);
    }
  }

  async markRepoEnabled(repo: Repository, hookId: string, store: VcsStore = this.store): Promise<Repository> {
    return store.updateRepository(repo.id, { hook: hookId, enabledByUserId: this.userId });
  }

  async markRepoDisabled(repo: Repository, store: VcsStore = this.store): Promise<Repository> {
    return store.updateRepository(repo.id, { hook: null, enabledByUserId: null });
  }

  // ============================================================================
  // Account setup
  // ============================================================================

  /**
   * First-time setup after OAuth: profile cache, webhook token id and the
   * link between the local user and the provider identity.
   */
  async initAccount(): Promise<void> {
    const account = await this.provider.getRemoteAccount();
    if (!account) {
      throw new RemoteAccountNotFound(this.userId, 'Remote account was not found for user.');
    }

    const user = await this.provider.getOwnUser();
    if (!user) {
      throw new UserInfoNoneError();
    }

    const extraData: RemoteAccountExtraData = {
      version: 1,
      id: user.id,
      login: user.username,
      name: user.displayName,
      tokens: { webhook: randomUUID() },
      lastSync: new Date().toISOString(),
    };
    await this.accounts.updateExtraData(account.id, extraData);
    account.extraData = extraData;

    await this.accounts.linkExternalId(this.userId, this.providerId, user.id);
  }

  // ============================================================================
  // Enable / disable
  // ============================================================================

  private async findAvailableRepository(repositoryId: string): Promise<Repository> {
    const repos = await this.userAvailableRepositories();
    const repo = repos.find((r) => r.providerId === repositoryId);
    if (!repo) {
      throw new RepositoryNotFoundError(repositoryId);
    }
    await this.checkRepoAccessPermissions(repo);
    return repo;
  }

  /**
   * Install the hook and mark the repository enabled
   * @returns false when the provider could not create the hook
   */
  async enableRepository(repositoryId: string): Promise<boolean> {
    const repo = await this.findAvailableRepository(repositoryId);

    const hookId = await this.provider.createWebhook(repositoryId);
    if (!hookId) {
      return false;
    }

    await this.markRepoEnabled(repo, hookId);
    trackEvent(this.userId, AnalyticsEvents.REPOSITORY_ENABLED, { provider: this.providerId });
    return true;
  }

  /**
   * Remove the hook and mark the repository disabled
   * @throws RepositoryDisabledError when no hook is recorded
   */
  async disableRepository(repositoryId: string, hookId?: string): Promise<boolean> {
    const repo = await this.findAvailableRepository(repositoryId);
    if (!repo.hook) {
      throw new RepositoryDisabledError(repositoryId);
    }

    if (!(await this.provider.deleteWebhook(repositoryId, hookId ?? repo.hook))) {
      return false;
    }

    await this.markRepoDisabled(repo);
    trackEvent(this.userId, AnalyticsEvents.REPOSITORY_DISABLED, { provider: this.providerId });
    return true;
  }
}
