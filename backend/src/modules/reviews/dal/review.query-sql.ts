/**
 * backend/src/modules/reviews/dal/review.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for reviews and the movie_ratings aggregate.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 * - Listings are keyset-paged on `seq` (newest first), never OFFSET.
 */

import { sql, type Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { MovieRatings, Reviews } from '../../../shared/db/schema.types';

export type ReviewRow = Selectable<Reviews>;
export type MovieRatingRow = Selectable<MovieRatings>;

export type ReviewListingRow = ReviewRow & {
  username: string;
  movie_title: string;
};

export async function selectReviewByIdSql(
  db: DbExecutor,
  reviewId: string,
  opts: { forUpdate?: boolean } = {},
): Promise<ReviewRow | undefined> {
  let query = db.selectFrom('reviews').selectAll().where('id', '=', reviewId);
  if (opts.forUpdate) query = query.forUpdate();
  return query.executeTakeFirst();
}

export async function selectReviewByUserAndMovieSql(
  db: DbExecutor,
  params: { userId: string; movieId: string },
): Promise<ReviewRow | undefined> {
  return db
    .selectFrom('reviews')
    .selectAll()
    .where('user_id', '=', params.userId)
    .where('movie_id', '=', params.movieId)
    .executeTakeFirst();
}

export async function selectReviewIdByMediaRefSql(
  db: DbExecutor,
  mediaRef: string,
): Promise<string | undefined> {
  const row = await db
    .selectFrom('reviews')
    .select('id')
    .where('media_ref', '=', mediaRef)
    .executeTakeFirst();
  return row?.id;
}

export async function selectMovieIdsReviewedByUserSql(
  db: DbExecutor,
  userId: string,
): Promise<string[]> {
  const rows = await db
    .selectFrom('reviews')
    .select('movie_id')
    .distinct()
    .where('user_id', '=', userId)
    .orderBy('movie_id')
    .execute();
  return rows.map((r) => r.movie_id);
}

export async function countReviewsForMovieSql(db: DbExecutor, movieId: string): Promise<number> {
  const row = await db
    .selectFrom('reviews')
    .select(sql<number>`count(*)::int`.as('count'))
    .where('movie_id', '=', movieId)
    .executeTakeFirstOrThrow();
  return row.count;
}

/** Full scan of the stored ratings for one movie. Source of truth for movie_ratings. */
export async function selectRatingStatsSql(
  db: DbExecutor,
  movieId: string,
): Promise<{ reviewCount: number; ratingSum: number }> {
  const row = await db
    .selectFrom('reviews')
    .select([
      sql<number>`count(*)::int`.as('review_count'),
      sql<number>`coalesce(sum(rating), 0)::int`.as('rating_sum'),
    ])
    .where('movie_id', '=', movieId)
    .executeTakeFirstOrThrow();

  return { reviewCount: row.review_count, ratingSum: row.rating_sum };
}

export async function selectMovieRatingSql(
  db: DbExecutor,
  movieId: string,
): Promise<MovieRatingRow | undefined> {
  return db
    .selectFrom('movie_ratings')
    .selectAll()
    .where('movie_id', '=', movieId)
    .executeTakeFirst();
}

function listingBase(db: DbExecutor) {
  return db
    .selectFrom('reviews as r')
    .innerJoin('users as u', 'u.id', 'r.user_id')
    .innerJoin('movies as m', 'm.id', 'r.movie_id')
    .selectAll('r')
    .select(['u.username as username', 'm.title as movie_title']);
}

export async function selectReviewListingByIdSql(
  db: DbExecutor,
  reviewId: string,
): Promise<ReviewListingRow | undefined> {
  return listingBase(db).where('r.id', '=', reviewId).executeTakeFirst();
}

/**
 * One page of listings, newest first.
 * - movieId null: across all movies.
 * - beforeSeq null: from the newest review.
 */
export async function selectReviewListingPageSql(
  db: DbExecutor,
  params: { movieId: string | null; beforeSeq: number | null; limit: number },
): Promise<ReviewListingRow[]> {
  let query = listingBase(db).orderBy('r.seq', 'desc').limit(params.limit);

  if (params.movieId !== null) query = query.where('r.movie_id', '=', params.movieId);
  if (params.beforeSeq !== null) query = query.where('r.seq', '<', params.beforeSeq);

  return query.execute();
}
