/**
 * Migration script: Copy the GitHub-only tables into the provider-neutral ones
 *
 * This script:
 * 1. Converts every remote account's cached data to the versioned shape
 * 2. Copies github_repositories into vcs_repositories (provider = 'github')
 * 3. Copies the webhook events the old releases point at
 * 4. Copies github_releases into vcs_releases, mapping the status codes
 *
 * Safe to re-run: rows already present are skipped.
 *
 * Usage: npm run migrate:legacy
 */

import 'dotenv/config';
import { and, eq, inArray } from 'drizzle-orm';
import { db, sql } from '../src/db';
import { remoteAccounts, vcsReleases, vcsRepositories, vcsWebhookEvents } from '../src/db/schema';
import {
  LEGACY_PROVIDER,
  legacyEventToRow,
  legacyReleaseToRow,
  legacyReleases,
  legacyRepositories,
  legacyRepositoryToRow,
  legacyWebhookEvents,
  upgradeLegacyExtraData,
} from '../src/db/legacy';
import { logger } from '../src/utils/sharedLogger';

async function migrateAccounts() {
  const accounts = await db.select().from(remoteAccounts).where(eq(remoteAccounts.provider, LEGACY_PROVIDER));
  for (const account of accounts) {
    await db
      .update(remoteAccounts)
      .set({ extraData: upgradeLegacyExtraData(account.extraData) })
      .where(eq(remoteAccounts.id, account.id));
  }
  console.log(`Accounts: ${accounts.length} converted`);
}

/**
 * @returns map from legacy repository id to the id of the row now holding it
 */
async function migrateRepositories(): Promise<Map<string, string>> {
  const legacyRows = await db.select().from(legacyRepositories);
  const ids = new Map<string, string>();
  let created = 0;
  let updated = 0;

  for (const legacy of legacyRows) {
    const row = legacyRepositoryToRow(legacy);
    const [existing] = row.providerId
      ? await db
          .select()
          .from(vcsRepositories)
          .where(and(eq(vcsRepositories.provider, LEGACY_PROVIDER), eq(vcsRepositories.providerId, row.providerId)))
          .limit(1)
      : await db.select().from(vcsRepositories).where(eq(vcsRepositories.id, legacy.id)).limit(1);

    if (existing) {
      // The hook state of the old table wins over what a sync may have found
      await db
        .update(vcsRepositories)
        .set({ hook: row.hook, enabledByUserId: row.enabledByUserId, updatedAt: new Date() })
        .where(eq(vcsRepositories.id, existing.id));
      ids.set(legacy.id, existing.id);
      updated++;
      continue;
    }

    await db.insert(vcsRepositories).values(row);
    ids.set(legacy.id, legacy.id);
    created++;
  }

  console.log(`Repositories: ${created} created, ${updated} updated`);
  return ids;
}

async function migrateReleases(repositoryIds: Map<string, string>) {
  const legacyRows = await db.select().from(legacyReleases);

  const eventIds = [...new Set(legacyRows.flatMap((release) => (release.eventId ? [release.eventId] : [])))];
  const copiedEvents = new Set<string>();
  if (eventIds.length > 0) {
    const events = await db.select().from(legacyWebhookEvents).where(inArray(legacyWebhookEvents.id, eventIds));
    for (const event of events) {
      await db.insert(vcsWebhookEvents).values(legacyEventToRow(event)).onConflictDoNothing();
      copiedEvents.add(event.id);
    }
    console.log(`Webhook events: ${events.length} copied`);
  }

  let created = 0;
  let skipped = 0;
  for (const legacy of legacyRows) {
    const repositoryId = legacy.repositoryId ? repositoryIds.get(legacy.repositoryId) : undefined;
    if (!repositoryId) {
      logger.warn({ releaseId: legacy.releaseId }, 'Legacy release has no repository, skipping');
      skipped++;
      continue;
    }

    const eventId = legacy.eventId && copiedEvents.has(legacy.eventId) ? legacy.eventId : null;
    const inserted = await db
      .insert(vcsReleases)
      .values(legacyReleaseToRow(legacy, repositoryId, eventId))
      .onConflictDoNothing()
      .returning({ id: vcsReleases.id });

    if (inserted.length > 0) {
      created++;
    } else {
      skipped++;
    }
  }

  console.log(`Releases: ${created} created, ${skipped} skipped`);
}

async function migrateLegacyGithub() {
  console.log('Starting legacy GitHub migration...\n');

  await migrateAccounts();
  const repositoryIds = await migrateRepositories();
  await migrateReleases(repositoryIds);

  console.log('\nMigration complete');
}

migrateLegacyGithub()
  .catch((error) => {
    console.error('Migration failed:', error);
    process.exitCode = 1;
  })
  .finally(() => sql.end());
