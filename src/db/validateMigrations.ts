/**
 * Checks that every migration SQL file drizzle-kit wrote is registered in the
 * journal. The drizzle migrator only applies journal entries, so an
 * unregistered file would be skipped without a word.
 */

import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';

export const MIGRATIONS_FOLDER = './drizzle';

const journalSchema = z.object({
  dialect: z.string(),
  entries: z.array(z.object({ idx: z.number(), tag: z.string() })),
});

export interface MigrationValidation {
  valid: boolean;
  missingFromJournal: string[];
  orphanedInJournal: string[];
}

/**
 * @throws when the folder or its journal cannot be read or parsed
 */
export async function validateMigrations(migrationsFolder = MIGRATIONS_FOLDER): Promise<MigrationValidation> {
  const files = await readdir(migrationsFolder);
  const sqlTags = files
    .filter((f) => f.endsWith('.sql'))
    .map((f) => f.slice(0, -'.sql'.length))
    .sort();

  const journalContent = await readFile(join(migrationsFolder, 'meta', '_journal.json'), 'utf-8');
  const journal = journalSchema.parse(JSON.parse(journalContent));
  const journalTags = new Set(journal.entries.map((e) => e.tag));
  const sqlTagSet = new Set(sqlTags);

  const missingFromJournal = sqlTags.filter((tag) => !journalTags.has(tag));
  const orphanedInJournal = journal.entries.map((e) => e.tag).filter((tag) => !sqlTagSet.has(tag));

  return {
    valid: missingFromJournal.length === 0 && orphanedInJournal.length === 0,
    missingFromJournal,
    orphanedInJournal,
  };
}
