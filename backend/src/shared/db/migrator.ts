/**
 * backend/src/shared/db/migrator.ts
 *
 * WHY:
 * - One migration entry point shared by the CLI (migrate.ts) and the test harness.
 * - Migrations are registered statically in ./migrations/index.ts.
 */

import { Migrator } from 'kysely';

import type { Db } from './db';
import { migrations } from './migrations';
import { logger } from '../logger/logger';

export function createMigrator(db: Db): Migrator {
  return new Migrator({
    db,
    provider: {
      getMigrations: async () => migrations,
    },
  });
}

/**
 * Brings the schema to the latest migration. Throws on the first failure.
 */
export async function migrateToLatest(db: Db): Promise<void> {
  const { error, results } = await createMigrator(db).migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration error', { migration: r.migrationName });
  });

  if (error) throw error;
}
