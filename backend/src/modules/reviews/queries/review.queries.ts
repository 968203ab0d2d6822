/**
 * backend/src/modules/reviews/queries/review.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into Review domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  selectMovieRatingSql,
  selectReviewListingByIdSql,
  selectReviewListingPageSql,
} from '../dal/review.query-sql';
import type { MovieRatingRow, ReviewListingRow, ReviewRow } from '../dal/review.query-sql';
import type { AggregateRating, Review, ReviewListing } from '../review.types';

export function toReview(row: ReviewRow): Review {
  return {
    id: row.id,
    userId: row.user_id,
    movieId: row.movie_id,
    rating: row.rating,
    title: row.title,
    body: row.body,
    mediaRef: row.media_ref,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toReviewListing(row: ReviewListingRow): ReviewListing {
  return {
    ...toReview(row),
    username: row.username,
    movieTitle: row.movie_title,
  };
}

export function toAggregateRating(
  movieId: string,
  stats: { reviewCount: number; ratingSum: number },
): AggregateRating {
  return {
    movieId,
    count: stats.reviewCount,
    mean: stats.reviewCount === 0 ? null : stats.ratingSum / stats.reviewCount,
  };
}

function rowToAggregate(movieId: string, row: MovieRatingRow | undefined): AggregateRating {
  return toAggregateRating(movieId, {
    reviewCount: row?.review_count ?? 0,
    ratingSum: row?.rating_sum ?? 0,
  });
}

export async function getReviewListingById(
  db: DbExecutor,
  reviewId: string,
): Promise<ReviewListing | undefined> {
  const row = await selectReviewListingByIdSql(db, reviewId);
  if (!row) return undefined;
  return toReviewListing(row);
}

/** A movie without a movie_ratings row has never been reviewed: count 0. */
export async function getAggregateRating(
  db: DbExecutor,
  movieId: string,
): Promise<AggregateRating> {
  const row = await selectMovieRatingSql(db, movieId);
  return rowToAggregate(movieId, row);
}

/**
 * Lazy, finite, restartable sequence of listings, newest first.
 * Each iteration starts over from the newest review and pulls one page at a time,
 * so nothing is loaded until the consumer asks for it.
 */
export function reviewListings(
  db: DbExecutor,
  params: { movieId: string | null; pageSize: number },
): AsyncIterable<ReviewListing> {
  return {
    async *[Symbol.asyncIterator]() {
      let beforeSeq: number | null = null;

      for (;;) {
        const rows = await selectReviewListingPageSql(db, {
          movieId: params.movieId,
          beforeSeq,
          limit: params.pageSize,
        });

        for (const row of rows) yield toReviewListing(row);

        const last = rows.at(-1);
        if (!last || rows.length < params.pageSize) return;
        beforeSeq = last.seq;
      }
    },
  };
}

/** Collects at most `limit` items from an async sequence and stops pulling. */
export async function takeListings<T>(source: AsyncIterable<T>, limit: number): Promise<T[]> {
  const out: T[] = [];
  if (limit <= 0) return out;

  for await (const item of source) {
    out.push(item);
    if (out.length >= limit) break;
  }

  return out;
}
