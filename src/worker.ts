/**
 * Background worker process: BullMQ workers for hooks, releases and
 * accounts, plus the repeatable stale-account refresh.
 */

import { getAppContext } from './context';
import { sql as dbConnection } from './db';
import { getRegisteredProviders } from './services/vcs';
import { closeQueues, scheduleAccountRefresh } from './tasks/queues';
import { startWorkers, stopWorkers } from './tasks/workers';
import { initAnalytics, shutdownAnalytics } from './utils/analytics';
import { closeSentry, initSentry } from './utils/sentry';
import { logger } from './utils/sharedLogger';

const start = async () => {
  initSentry();
  initAnalytics();

  const context = getAppContext();
  startWorkers(context);
  await scheduleAccountRefresh(getRegisteredProviders().map((factory) => factory.id));

  const shutdown = async () => {
    logger.info('Worker shutting down...');
    await stopWorkers();
    await closeQueues();
    await shutdownAnalytics();
    await closeSentry();
    await dbConnection.end();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
};

start().catch((err) => {
  logger.fatal({ err }, 'Worker failed to start');
  process.exit(1);
});
