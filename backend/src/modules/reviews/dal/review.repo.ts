/**
 * backend/src/modules/reviews/dal/review.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for reviews and the movie_ratings aggregate.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 */

import { sql } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { ReviewRow } from './review.query-sql';

export type ReviewWriteFields = {
  rating: number;
  title: string | null;
  body: string | null;
  mediaRef: string | null;
};

export type RemovedReview = {
  id: string;
  movieId: string;
  mediaRef: string | null;
};

export class ReviewRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): ReviewRepo {
    return new ReviewRepo(db);
  }

  /**
   * Unique on (user_id, movie_id): a concurrent first submit surfaces as a unique
   * violation for the loser. The service retries.
   */
  async insertReview(
    params: { userId: string; movieId: string } & ReviewWriteFields,
  ): Promise<ReviewRow> {
    return this.db
      .insertInto('reviews')
      .values({
        user_id: params.userId,
        movie_id: params.movieId,
        rating: params.rating,
        title: params.title,
        body: params.body,
        media_ref: params.mediaRef,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  /** Resubmission: id, seq and created_at are kept; everything else is overwritten. */
  async updateReview(reviewId: string, fields: ReviewWriteFields): Promise<ReviewRow> {
    return this.db
      .updateTable('reviews')
      .set({
        rating: fields.rating,
        title: fields.title,
        body: fields.body,
        media_ref: fields.mediaRef,
        updated_at: sql<Date>`now()`,
      })
      .where('id', '=', reviewId)
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  async deleteReview(reviewId: string): Promise<boolean> {
    const res = await this.db.deleteFrom('reviews').where('id', '=', reviewId).executeTakeFirst();
    return res.numDeletedRows > 0n;
  }

  async deleteReviewsByUser(userId: string): Promise<RemovedReview[]> {
    const rows = await this.db
      .deleteFrom('reviews')
      .where('user_id', '=', userId)
      .returning(['id', 'movie_id', 'media_ref'])
      .execute();

    return rows.map((r) => ({ id: r.id, movieId: r.movie_id, mediaRef: r.media_ref }));
  }

  async deleteReviewsByMovie(movieId: string): Promise<RemovedReview[]> {
    const rows = await this.db
      .deleteFrom('reviews')
      .where('movie_id', '=', movieId)
      .returning(['id', 'movie_id', 'media_ref'])
      .execute();

    return rows.map((r) => ({ id: r.id, movieId: r.movie_id, mediaRef: r.media_ref }));
  }

  /** Overwrites the aggregate with freshly scanned values. Never increments. */
  async upsertMovieRating(params: {
    movieId: string;
    reviewCount: number;
    ratingSum: number;
  }): Promise<void> {
    await this.db
      .insertInto('movie_ratings')
      .values({
        movie_id: params.movieId,
        review_count: params.reviewCount,
        rating_sum: params.ratingSum,
      })
      .onConflict((oc) =>
        oc.column('movie_id').doUpdateSet({
          review_count: params.reviewCount,
          rating_sum: params.ratingSum,
          updated_at: sql<Date>`now()`,
        }),
      )
      .execute();
  }
}
