/**
 * src/shared/db/migrations/0002_movies.ts
 *
 * WHY:
 * - Catalog of movies that reviews attach to.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('movies')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('title', 'text', (col) => col.notNull())
    .addColumn('release_year', 'integer')
    .addColumn('genre', 'text')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE movies
      ADD CONSTRAINT movies_title_not_blank
      CHECK (length(btrim(title)) > 0);
  `.execute(db);

  // Catalog listing is ordered by title
  await db.schema.createIndex('movies_title_idx').on('movies').column('title').execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('movies').ifExists().execute();
}
