/**
 * src/shared/db/migrations/0001_users.ts
 *
 * WHY:
 * - Credential store: one row per account, password kept only as a bcrypt hash.
 *
 * RULES:
 * - Usernames are unique case-insensitively (unique index on lower(username)).
 *   The stored value keeps the casing the user registered with.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('users')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('username', 'text', (col) => col.notNull())
    .addColumn('password_hash', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    CREATE UNIQUE INDEX users_username_lower_uq
      ON users (lower(username));
  `.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('users').ifExists().execute();
}
