/**
 * src/shared/db/migrations/index.ts
 *
 * WHY:
 * - Static registry of migrations. The CLI runner and the test harness both read
 *   from here, so the order is decided in one place and no directory scan or
 *   dynamic import is needed.
 *
 * RULES:
 * - Append only. Never rename or reorder a shipped migration.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_users';
import * as m0002 from './0002_movies';
import * as m0003 from './0003_reviews';

export const migrations: Record<string, Migration> = {
  '0001_users': m0001,
  '0002_movies': m0002,
  '0003_reviews': m0003,
};
