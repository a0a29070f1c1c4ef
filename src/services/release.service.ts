/**
 * Release API
 *
 * One received release bound to the provider session of the user who enabled
 * its repository. Everything about the release is read from the stored
 * webhook payload, so processing needs no extra provider call until the
 * archive is fetched.
 */

import type { Release, ReleaseErrorPayload, Repository, WebhookEvent } from '../db/schema';
import type { VcsStore } from './store';
import type { RepositoryProvider } from './vcs/base.provider';
import type { GenericContributor, GenericOwner, GenericRelease, GenericRepository } from './vcs/types';
import type { DepositService } from './deposit.service';
import { ReleaseZipballFetchError, RepositoryNotFoundError } from './vcs/errors';
import { InternalError } from '../lib/errors';
import { config } from '../config';
import { logger } from '../utils/sharedLogger';
import { AnalyticsEvents, trackEvent } from '../utils/analytics';

export interface VcsReleaseOptions {
  zipballTimeoutSeconds?: number;
  maxContributors?: number;
}

export class VcsRelease {
  readonly generic: GenericRelease;
  readonly genericRepository: GenericRepository;

  private resolvedZipballUrl: string | null = null;
  private contributorsCache: Promise<GenericContributor[] | null> | null = null;
  private readonly zipballTimeoutSeconds: number;
  private readonly maxContributors: number;

  constructor(
    public release: Release,
    readonly repository: Repository,
    readonly event: WebhookEvent,
    readonly provider: RepositoryProvider,
    private readonly store: VcsStore,
    options: VcsReleaseOptions = {}
  ) {
    const normalized = provider.factory.webhookEventToGeneric(event.payload);
    this.generic = normalized.release;
    this.genericRepository = normalized.repository;
    this.zipballTimeoutSeconds = options.zipballTimeoutSeconds ?? config.vcs.zipballTimeoutSeconds;
    this.maxContributors = options.maxContributors ?? config.vcs.maxContributors;
  }

  /**
   * Load the repository and originating event of a stored release
   */
  static async load(
    release: Release,
    provider: RepositoryProvider,
    store: VcsStore,
    options?: VcsReleaseOptions
  ): Promise<VcsRelease> {
    const repository = await store.getRepositoryById(release.repositoryId);
    if (!repository) {
      throw new RepositoryNotFoundError(release.repositoryId);
    }

    const event = release.eventId ? await store.getWebhookEvent(release.eventId) : null;
    if (!event) {
      throw new InternalError(`Release ${release.id} has no webhook event to read its payload from`);
    }

    return new VcsRelease(release, repository, event, provider, store, options);
  }

  get releaseFileName(): string {
    return `${this.genericRepository.fullName}-${this.generic.tagName}.zip`;
  }

  // ============================================================================
  // Archive
  // ============================================================================

  /**
   * Settle the archive URL once; later calls reuse it unless `cache` is false
   */
  async resolveZipballUrl(cache = true): Promise<string> {
    if (cache && this.resolvedZipballUrl) {
      return this.resolvedZipballUrl;
    }

    const url = this.generic.zipballUrl;
    if (!url) {
      throw new ReleaseZipballFetchError(`Release ${this.generic.tagName} has no zip archive`);
    }

    const resolved = await this.provider.resolveReleaseZipballUrl(url);
    if (cache) {
      this.resolvedZipballUrl = resolved;
    }
    return resolved;
  }

  async withZipball<T>(consume: (body: ReadableStream<Uint8Array>) => Promise<T>): Promise<T> {
    const url = await this.resolveZipballUrl();
    return this.provider.withReleaseZipball(url, this.zipballTimeoutSeconds, consume);
  }

  // ============================================================================
  // Authorship
  // ============================================================================

  contributors(): Promise<GenericContributor[] | null> {
    if (!this.contributorsCache) {
      this.contributorsCache = this.repository.providerId
        ? this.provider.listRepositoryContributors(this.repository.providerId, this.maxContributors)
        : Promise.resolve(null);
    }
    return this.contributorsCache;
  }

  /**
   * Repository owner, or null when it cannot be fetched
   */
  async owner(): Promise<GenericOwner | null> {
    if (!this.repository.providerId) {
      return null;
    }
    try {
      return await this.provider.getRepositoryOwner(this.repository.providerId);
    } catch (error) {
      logger.debug(
        { repositoryId: this.repository.providerId, err: error instanceof Error ? error.message : String(error) },
        'Could not fetch repository owner'
      );
      return null;
    }
  }

  async isFirstRelease(): Promise<boolean> {
    return (await this.store.getLatestRelease(this.repository.id, 'published')) === null;
  }

  // ============================================================================
  // Status
  // ============================================================================

  async markProcessing(): Promise<void> {
    this.release = await this.store.updateRelease(this.release.id, { status: 'processing', errors: null });
  }

  async markPublished(recordId: string): Promise<void> {
    this.release = await this.store.updateRelease(this.release.id, { status: 'published', recordId, errors: null });
  }

  async markFailed(errors: ReleaseErrorPayload): Promise<void> {
    this.release = await this.store.updateRelease(this.release.id, { status: 'failed', errors });
  }

  /**
   * PROCESSING → deposit → PUBLISHED. Failures propagate to the caller's
   * error handlers with the release left in PROCESSING.
   */
  async processRelease(deposit: DepositService): Promise<void> {
    await this.markProcessing();
    const { recordId } = await deposit.publish(this);
    await this.markPublished(recordId);

    trackEvent(this.provider.userId, AnalyticsEvents.RELEASE_PUBLISHED, {
      provider: this.provider.factory.id,
    });
    logger.info(
      { provider: this.provider.factory.id, releaseId: this.release.providerId, recordId },
      'Release published'
    );
  }
}
