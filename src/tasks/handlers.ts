/**
 * Background job bodies. Queue-agnostic: workers.ts feeds them from BullMQ,
 * tests call them directly.
 */

import type {
  DisconnectProviderJob,
  ProcessReleaseJob,
  RefreshAccountsJob,
  SyncAccountJob,
  SyncHooksJob,
} from './types';
import type { Release } from '../db/schema';
import type { DepositService } from '../services/deposit.service';
import type { VcsStore } from '../services/store';
import type { VcsReleaseOptions } from '../services/release.service';
import { VcsRelease } from '../services/release.service';
import { VersionControlService, type VcsServiceDeps } from '../services/vcs.service';
import { getProvider } from '../services/vcs';
import { RepositoryDisabledError, RepositoryNotFoundError } from '../services/vcs/errors';
import { handleReleaseError, type ReleaseErrorHandler, type ReleaseFailureTarget } from './errorHandlers';
import { getEncryptionService } from '../utils/encryption';
import { config } from '../config';
import { logger } from '../utils/sharedLogger';
import { maskToken } from '../utils/logger';
import { AnalyticsEvents, trackEvent } from '../utils/analytics';

export interface TaskDeps extends VcsServiceDeps {
  deposit: DepositService;
  errorHandlers?: ReleaseErrorHandler[];
  releaseOptions?: VcsReleaseOptions;
}

export type ReleaseJobOutcome = 'published' | 'failed' | 'skipped';

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Hooks
// ============================================================================

export async function syncHooks(job: SyncHooksJob, deps: TaskDeps): Promise<void> {
  const svc = VersionControlService.forProviderAndUser(job.provider, job.userId, deps);
  await svc.syncRepoHooks(job.repositoryIds);
}

/**
 * Remote half of a disconnect. The account row is already gone, so the
 * token travels with the job. Hook removal is best effort; once done the
 * token is revoked. A failure on revocation retries the whole job.
 */
export async function disconnectProvider(job: DisconnectProviderJob): Promise<void> {
  const accessToken = await getEncryptionService().decrypt(job.accessToken);
  const provider = getProvider(job.provider).forAccessToken(job.userId, accessToken);

  for (const { repositoryId, hookId } of job.repoHooks) {
    try {
      if (await provider.deleteWebhook(repositoryId, hookId)) {
        logger.info({ provider: job.provider, repositoryId, hookId }, 'Deleted hook from repository');
      }
    } catch (error) {
      logger.warn(
        { provider: job.provider, repositoryId, hookId, err: error instanceof Error ? error.message : String(error) },
        'Could not delete hook'
      );
    }
  }

  await provider.revokeToken(accessToken);
  logger.info({ provider: job.provider, userId: job.userId, token: maskToken(accessToken) }, 'Provider token revoked');
}

// ============================================================================
// Releases
// ============================================================================

function storedReleaseTarget(release: Release, store: VcsStore, userId: string | null): ReleaseFailureTarget {
  return {
    provider: release.provider,
    releaseId: release.providerId,
    userId,
    markFailed: async (errors) => {
      await store.updateRelease(release.id, { status: 'failed', errors });
    },
  };
}

function vcsReleaseTarget(vcsRelease: VcsRelease): ReleaseFailureTarget {
  return {
    provider: vcsRelease.provider.factory.id,
    releaseId: vcsRelease.release.providerId,
    userId: vcsRelease.provider.userId,
    markFailed: (errors) => vcsRelease.markFailed(errors),
  };
}

/**
 * Archive one release. Releases already past RECEIVED/FAILED are skipped so
 * that a redelivered job is harmless. Every failure, loading included, is
 * stored on the release before the job ends.
 * @throws the original error when the fallback handler asks for a retry
 */
export async function processRelease(job: ProcessReleaseJob, deps: TaskDeps): Promise<ReleaseJobOutcome> {
  const release = await deps.store.getReleaseInStatus(job.provider, job.releaseId, ['received', 'failed']);
  if (!release) {
    logger.info({ provider: job.provider, releaseId: job.releaseId }, 'No release awaiting processing');
    return 'skipped';
  }

  let target = storedReleaseTarget(release, deps.store, null);

  try {
    const repository = await deps.store.getRepositoryById(release.repositoryId);
    if (!repository) {
      throw new RepositoryNotFoundError(release.repositoryId);
    }

    if (!repository.enabledByUserId) {
      const error = new RepositoryDisabledError(repository.fullName);
      await target.markFailed({ errors: error.message, kind: error.kind });
      logger.warn({ provider: job.provider, releaseId: job.releaseId }, 'Repository was disabled before processing');
      return 'failed';
    }

    target = storedReleaseTarget(release, deps.store, repository.enabledByUserId);
    const provider = getProvider(job.provider).forUser(repository.enabledByUserId);
    const vcsRelease = await VcsRelease.load(release, provider, deps.store, deps.releaseOptions);
    target = vcsReleaseTarget(vcsRelease);

    await vcsRelease.processRelease(deps.deposit);
    return 'published';
  } catch (error) {
    const { retry } = await handleReleaseError(target, error, deps.errorHandlers);
    trackEvent(target.userId ?? 'anonymous', AnalyticsEvents.RELEASE_FAILED, { provider: job.provider, retry });
    if (retry) {
      throw error;
    }
    return 'failed';
  }
}

// ============================================================================
// Accounts
// ============================================================================

/**
 * Queue a sync for every account not refreshed within the threshold, so that
 * provider tokens do not expire from inactivity.
 * @returns number of accounts queued
 */
export async function refreshAccounts(job: RefreshAccountsJob, deps: TaskDeps, now = new Date()): Promise<number> {
  const thresholdDays = job.thresholdDays ?? config.vcs.refreshThresholdDays;
  const updatedBefore = new Date(now.getTime() - thresholdDays * DAY_MS);

  const stale = await deps.accounts.listStaleAccounts(job.provider, updatedBefore);
  for (const account of stale) {
    await deps.dispatcher.syncAccount({ provider: job.provider, userId: account.userId });
  }

  logger.info({ provider: job.provider, thresholdDays, accounts: stale.length }, 'Queued stale account refresh');
  return stale.length;
}

export async function syncAccount(job: SyncAccountJob, deps: TaskDeps): Promise<void> {
  await deps.store.transaction(async (tx) => {
    const svc = VersionControlService.forProviderAndUser(job.provider, job.userId, { ...deps, store: tx });
    await svc.sync({ hooks: false, asyncHooks: false });
  });
}
