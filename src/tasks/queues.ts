import { Queue, type ConnectionOptions, type JobsOptions } from 'bullmq';
import type {
  DisconnectProviderJob,
  ProcessReleaseJob,
  RefreshAccountsJob,
  SyncAccountJob,
  SyncHooksJob,
  TaskDispatcher,
} from './types';
import { config } from '../config';
import { logger } from '../utils/sharedLogger';

// Queue names
export const HOOKS_QUEUE = 'vcs-hooks';
export const RELEASES_QUEUE = 'vcs-releases';
export const ACCOUNTS_QUEUE = 'vcs-accounts';

export type HookQueueJob =
  | { type: 'sync-hooks'; data: SyncHooksJob }
  | { type: 'disconnect-provider'; data: DisconnectProviderJob };

export type ReleaseQueueJob = { type: 'process-release'; data: ProcessReleaseJob };

export type AccountQueueJob =
  | { type: 'refresh-accounts'; data: RefreshAccountsJob }
  | { type: 'sync-account'; data: SyncAccountJob };

const RETRY_DELAY_MS = 10 * 60 * 1000;

const baseJobOptions: JobsOptions = {
  backoff: {
    type: 'fixed',
    delay: RETRY_DELAY_MS,
  },
  removeOnComplete: {
    age: 24 * 60 * 60,
    count: 1000,
  },
  removeOnFail: {
    age: 7 * 24 * 60 * 60,
  },
};

// Queue instances (singletons)
let hooksQueue: Queue<HookQueueJob> | null = null;
let releasesQueue: Queue<ReleaseQueueJob> | null = null;
let accountsQueue: Queue<AccountQueueJob> | null = null;

/**
 * Get Redis connection config
 */
export function getRedisConnection(): ConnectionOptions {
  const url = new URL(config.redis.url);
  return {
    host: url.hostname,
    port: parseInt(url.port || '6379'),
    password: url.password || undefined,
    // Workers block on Redis; BullMQ requires this to be null
    maxRetriesPerRequest: null,
  };
}

export function getHooksQueue(): Queue<HookQueueJob> {
  if (!hooksQueue) {
    hooksQueue = new Queue<HookQueueJob>(HOOKS_QUEUE, {
      connection: getRedisConnection(),
      defaultJobOptions: { ...baseJobOptions, attempts: 7 },
    });
  }
  return hooksQueue;
}

export function getReleasesQueue(): Queue<ReleaseQueueJob> {
  if (!releasesQueue) {
    releasesQueue = new Queue<ReleaseQueueJob>(RELEASES_QUEUE, {
      connection: getRedisConnection(),
      defaultJobOptions: { ...baseJobOptions, attempts: config.vcs.releaseMaxAttempts },
    });
  }
  return releasesQueue;
}

export function getAccountsQueue(): Queue<AccountQueueJob> {
  if (!accountsQueue) {
    accountsQueue = new Queue<AccountQueueJob>(ACCOUNTS_QUEUE, {
      connection: getRedisConnection(),
      defaultJobOptions: { ...baseJobOptions, attempts: 3 },
    });
  }
  return accountsQueue;
}

/**
 * BullMQ rejects custom job ids containing ':'
 */
export function releaseJobId(data: ProcessReleaseJob): string {
  return `release-${data.provider}-${data.releaseId}`.replace(/:/g, '_');
}

/**
 * Producer side of the background jobs, backed by BullMQ
 */
export class BullTaskDispatcher implements TaskDispatcher {
  async syncHooks(data: SyncHooksJob): Promise<void> {
    await getHooksQueue().add('sync-hooks', { type: 'sync-hooks', data });
    logger.debug({ provider: data.provider, userId: data.userId, repositories: data.repositoryIds.length }, 'Hook sync enqueued');
  }

  async disconnectProvider(data: DisconnectProviderJob): Promise<void> {
    await getHooksQueue().add('disconnect-provider', { type: 'disconnect-provider', data });
    logger.debug({ provider: data.provider, userId: data.userId }, 'Provider disconnect enqueued');
  }

  async processRelease(data: ProcessReleaseJob): Promise<void> {
    // One job per release: re-adding while it is queued or kept is a no-op
    await getReleasesQueue().add(
      'process-release',
      { type: 'process-release', data },
      { jobId: releaseJobId(data) }
    );
    logger.debug({ provider: data.provider, releaseId: data.releaseId }, 'Release processing enqueued');
  }

  async refreshAccounts(data: RefreshAccountsJob): Promise<void> {
    await getAccountsQueue().add('refresh-accounts', { type: 'refresh-accounts', data });
  }

  async syncAccount(data: SyncAccountJob): Promise<void> {
    await getAccountsQueue().add('sync-account', { type: 'sync-account', data });
  }
}

/**
 * Schedule the periodic stale-account sweep for each provider. Re-running
 * replaces the schedule rather than adding a second one.
 */
export async function scheduleAccountRefresh(providerIds: readonly string[]): Promise<void> {
  const queue = getAccountsQueue();
  for (const provider of providerIds) {
    await queue.add(
      'refresh-accounts',
      { type: 'refresh-accounts', data: { provider } },
      {
        repeat: { pattern: config.vcs.refreshCron },
        jobId: `refresh-accounts-${provider}`,
      }
    );
  }
  logger.info({ providers: providerIds, pattern: config.vcs.refreshCron }, 'Account refresh scheduled');
}

/**
 * Close all queues
 */
export async function closeQueues(): Promise<void> {
  const queues = [hooksQueue, releasesQueue, accountsQueue];
  hooksQueue = null;
  releasesQueue = null;
  accountsQueue = null;
  for (const queue of queues) {
    if (queue) {
      await queue.close();
    }
  }
}
