import { drizzle } from 'drizzle-orm/postgres-js';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import postgres from 'postgres';
import { config } from '../config';
import { logger } from '../utils/sharedLogger';
import { MIGRATIONS_FOLDER, validateMigrations } from './validateMigrations';

const runMigrations = async () => {
  const validation = await validateMigrations();

  if (validation.missingFromJournal.length > 0) {
    logger.error(
      { missing: validation.missingFromJournal.map((tag) => `${tag}.sql`) },
      'SQL files are not registered in drizzle/meta/_journal.json and would not be applied; regenerate the migrations'
    );
    process.exitCode = 1;
    return;
  }

  if (validation.orphanedInJournal.length > 0) {
    logger.warn({ orphaned: validation.orphanedInJournal }, 'Journal entries without SQL files');
  }

  const connection = postgres(config.database.url, { max: 1 });
  try {
    logger.info({ migrationsFolder: MIGRATIONS_FOLDER }, 'Running migrations');
    await migrate(drizzle(connection), { migrationsFolder: MIGRATIONS_FOLDER });
    logger.info('Migrations completed');
  } finally {
    await connection.end();
  }
};

runMigrations().catch((err) => {
  logger.error({ err }, 'Migration failed');
  process.exitCode = 1;
});
