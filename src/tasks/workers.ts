import { Worker, type Job } from 'bullmq';
import {
  ACCOUNTS_QUEUE,
  HOOKS_QUEUE,
  RELEASES_QUEUE,
  getRedisConnection,
  type AccountQueueJob,
  type HookQueueJob,
  type ReleaseQueueJob,
} from './queues';
import {
  disconnectProvider,
  processRelease,
  refreshAccounts,
  syncAccount,
  syncHooks,
  type ReleaseJobOutcome,
  type TaskDeps,
} from './handlers';
import { logger } from '../utils/sharedLogger';
import { captureError } from '../utils/sentry';

// Workers
let workers: Worker[] = [];

export function createJobProcessors(deps: TaskDeps) {
  return {
    async hooks(job: Job<HookQueueJob>): Promise<void> {
      const { data: message } = job;
      switch (message.type) {
        case 'sync-hooks':
          return syncHooks(message.data, deps);
        case 'disconnect-provider':
          return disconnectProvider(message.data);
      }
    },

    async releases(job: Job<ReleaseQueueJob>): Promise<ReleaseJobOutcome> {
      return processRelease(job.data.data, deps);
    },

    async accounts(job: Job<AccountQueueJob>): Promise<number | void> {
      const { data: message } = job;
      switch (message.type) {
        case 'refresh-accounts':
          return refreshAccounts(message.data, deps);
        case 'sync-account':
          return syncAccount(message.data, deps);
      }
    },
  };
}

function watch(worker: Worker, label: string): Worker {
  worker.on('completed', (job) => {
    logger.info({ queue: label, jobId: job.id, name: job.name }, 'Job completed');
  });

  worker.on('failed', (job, error) => {
    const attempts = job?.opts.attempts ?? 1;
    const exhausted = !!job && job.attemptsMade >= attempts;
    logger.error(
      { queue: label, jobId: job?.id, name: job?.name, attemptsMade: job?.attemptsMade, exhausted, err: error.message },
      'Job failed'
    );
    if (exhausted) {
      captureError(error, { extra: { queue: label, jobId: job?.id, name: job?.name } });
    }
  });

  worker.on('error', (error) => {
    logger.error({ queue: label, err: error.message }, 'Worker error');
  });

  return worker;
}

/**
 * Start one worker per queue
 */
export function startWorkers(deps: TaskDeps): Worker[] {
  if (workers.length > 0) {
    return workers;
  }

  const processors = createJobProcessors(deps);
  const connection = getRedisConnection();

  workers = [
    watch(new Worker<HookQueueJob, void>(HOOKS_QUEUE, processors.hooks, { connection, concurrency: 5, limiter: { max: 100, duration: 60_000 } }), HOOKS_QUEUE),
    watch(new Worker<ReleaseQueueJob, ReleaseJobOutcome>(RELEASES_QUEUE, processors.releases, { connection, concurrency: 2 }), RELEASES_QUEUE),
    watch(new Worker<AccountQueueJob, number | void>(ACCOUNTS_QUEUE, processors.accounts, { connection, concurrency: 5 }), ACCOUNTS_QUEUE),
  ];

  logger.info({ queues: [HOOKS_QUEUE, RELEASES_QUEUE, ACCOUNTS_QUEUE] }, 'Workers started');
  return workers;
}

/**
 * Stop all workers
 */
export async function stopWorkers(): Promise<void> {
  const running = workers;
  workers = [];
  for (const worker of running) {
    await worker.close();
  }
  logger.info('Workers stopped');
}
