/**
 * src/shared/db/migrations/0003_reviews.ts
 *
 * WHY:
 * - Review ledger + the derived per-movie rating aggregate.
 *
 * RULES:
 * - One review per (user, movie): enforced by UNIQUE here, not only in the service.
 * - reviews -> users / movies are RESTRICT: deleting a user or movie must go
 *   through the ledger so the aggregate is recomputed and media is released.
 * - movie_ratings -> movies is CASCADE: the aggregate has no meaning without its movie.
 * - Rating bounds mirror modules/reviews/review.constants.ts.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('reviews')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('seq', 'integer', (col) => col.notNull().generatedAlwaysAsIdentity())
    .addColumn('user_id', 'uuid', (col) =>
      col.notNull().references('users.id').onDelete('restrict'),
    )
    .addColumn('movie_id', 'uuid', (col) =>
      col.notNull().references('movies.id').onDelete('restrict'),
    )
    .addColumn('rating', 'integer', (col) => col.notNull())
    .addColumn('title', 'text')
    .addColumn('body', 'text')
    // An upload is attached to at most one review, so releasing it on delete is safe.
    .addColumn('media_ref', 'text', (col) => col.unique())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE reviews
      ADD CONSTRAINT reviews_rating_range
      CHECK (rating BETWEEN 1 AND 5);
  `.execute(db);

  await sql`
    ALTER TABLE reviews
      ADD CONSTRAINT reviews_user_movie_uq
      UNIQUE (user_id, movie_id);
  `.execute(db);

  await db.schema.createIndex('reviews_seq_uq').on('reviews').column('seq').unique().execute();

  await db.schema
    .createIndex('reviews_movie_seq_idx')
    .on('reviews')
    .columns(['movie_id', 'seq'])
    .execute();

  await db.schema.createIndex('reviews_user_idx').on('reviews').column('user_id').execute();

  await db.schema
    .createTable('movie_ratings')
    .addColumn('movie_id', 'uuid', (col) =>
      col.primaryKey().references('movies.id').onDelete('cascade'),
    )
    .addColumn('review_count', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('rating_sum', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE movie_ratings
      ADD CONSTRAINT movie_ratings_non_negative
      CHECK (review_count >= 0 AND rating_sum >= 0);
  `.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('movie_ratings').ifExists().execute();
  await db.schema.dropTable('reviews').ifExists().execute();
}
