import { config } from './config';
import { buildApp } from './app';
import { getAppContext } from './context';
import { sql as dbConnection } from './db';
import { closeQueues } from './tasks/queues';
import { initAnalytics, shutdownAnalytics } from './utils/analytics';
import { closeSentry, initSentry } from './utils/sentry';
import { logger } from './utils/sharedLogger';

// Start server
const start = async () => {
  initSentry();
  initAnalytics();

  const fastify = await buildApp(getAppContext(), {
    checkDatabase: async () => {
      await dbConnection`SELECT 1`;
    },
  });

  // Check database connectivity before starting
  fastify.log.info('Checking database connectivity...');
  try {
    await dbConnection`SELECT 1`;
    fastify.log.info('Database connection successful');
  } catch (dbError) {
    fastify.log.error({ err: dbError }, 'Database connection failed');
    process.exit(1);
  }

  await fastify.listen({
    port: config.server.port,
    host: config.server.host,
  });
  fastify.log.info(`${config.server.siteName} API listening on ${config.server.host}:${config.server.port} (${config.server.nodeEnv})`);

  // Graceful shutdown
  const shutdown = async () => {
    fastify.log.info('Shutting down gracefully...');

    await fastify.close();
    await closeQueues();
    await shutdownAnalytics();
    await closeSentry();
    await dbConnection.end();

    fastify.log.info('Server shut down successfully');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
};

start().catch((err) => {
  logger.fatal({ err }, 'Server failed to start');
  process.exit(1);
});
