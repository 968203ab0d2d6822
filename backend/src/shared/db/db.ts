/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table types live in schema.types.ts and mirror the migrations.
 *
 * RULES:
 * - Idle-client errors arrive as pool 'error' events and are logged here; an
 *   unhandled 'error' event would exit the process.
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './schema.types';
import { logger } from '../logger/logger';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for both the main DB and transactions (`trx`).
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

export function createDb(databaseUrl: string): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  pool.on('error', (err) => {
    logger.error('db.pool.idle_client_error', { flow: 'db', message: err.message });
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
