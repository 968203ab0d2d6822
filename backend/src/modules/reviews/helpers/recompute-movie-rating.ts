/**
 * backend/src/modules/reviews/helpers/recompute-movie-rating.ts
 *
 * WHY:
 * - The aggregate is a cache of (count, sum) over the movie's stored ratings.
 *   Rewriting it from a full scan after every mutation means it can never drift,
 *   whatever the mix of inserts, updates and deletes.
 *
 * RULES:
 * - Call inside the mutating transaction, after the write, with the movie row locked.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { ReviewRepo } from '../dal/review.repo';
import { selectRatingStatsSql } from '../dal/review.query-sql';
import { toAggregateRating } from '../queries/review.queries';
import type { AggregateRating } from '../review.types';

export async function recomputeMovieRating(
  trx: DbExecutor,
  reviewRepo: ReviewRepo,
  movieId: string,
): Promise<AggregateRating> {
  const stats = await selectRatingStatsSql(trx, movieId);

  await reviewRepo.upsertMovieRating({
    movieId,
    reviewCount: stats.reviewCount,
    ratingSum: stats.ratingSum,
  });

  return toAggregateRating(movieId, stats);
}
