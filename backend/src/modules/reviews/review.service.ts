/**
 * backend/src/modules/reviews/review.service.ts
 *
 * WHY:
 * - Review Ledger: one review per (user, movie) and a per-movie aggregate
 *   that always equals the count and mean of the stored ratings.
 *
 * RULES:
 * - Every mutation is one transaction: lock movie row -> write -> recompute aggregate.
 * - submit also share-locks the author's user row first, same order as account deletion.
 * - Service owns transactions; DAL never opens one.
 * - cascadeDelete* run inside the CALLER's transaction (account deletion, movie removal)
 *   and return the media refs to release once that transaction commits.
 * - Media is released after commit only, best-effort.
 * - Callers pass the acting UserId explicitly; this module never sees a session.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { LogContext, Logger } from '../../shared/logger/logger';
import { withConflictRetry } from '../../shared/db/with-conflict-retry';
import { parseId } from '../../shared/validation/ids';
import type { MediaService } from '../media';
import { getMovieById, lockMovieForUpdate } from '../movies';
import { lockUser } from '../users';

import { ReviewRepo } from './dal/review.repo';
import {
  countReviewsForMovieSql,
  selectMovieIdsReviewedByUserSql,
  selectReviewByIdSql,
  selectReviewByUserAndMovieSql,
  selectReviewIdByMediaRefSql,
} from './dal/review.query-sql';
import {
  getAggregateRating,
  getReviewListingById,
  reviewListings,
  toReview,
} from './queries/review.queries';
import { recomputeMovieRating } from './helpers/recompute-movie-rating';
import { lockMoviesInOrder } from './helpers/lock-movies';
import {
  assertValidReviewInput,
  normalizeReviewText,
  resolvePageSize,
} from './policies/review-input.policy';
import { assertReviewAuthor } from './policies/review-ownership.policy';
import { ReviewErrors } from './review.errors';
import type {
  AggregateRating,
  ListReviewsOptions,
  ReviewListing,
  SubmitReviewParams,
  SubmitReviewResult,
} from './review.types';

type SubmitTxResult = SubmitReviewResult & {
  replacedMediaRef: string | null;
};

export class ReviewService {
  private readonly reviewRepo: ReviewRepo;

  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      mediaService: MediaService;
    },
  ) {
    this.reviewRepo = new ReviewRepo(deps.db);
  }

  async submit(params: SubmitReviewParams, ctx: LogContext = {}): Promise<SubmitReviewResult> {
    const input = {
      userId: parseId(params.userId, 'userId'),
      movieId: parseId(params.movieId, 'movieId'),
      rating: params.rating,
      title: normalizeReviewText(params.title),
      body: normalizeReviewText(params.body),
      mediaRef: normalizeReviewText(params.mediaRef),
    };

    assertValidReviewInput(input);

    if (input.mediaRef !== null && !(await this.deps.mediaService.exists(input.mediaRef))) {
      throw ReviewErrors.mediaNotFound({ mediaRef: input.mediaRef });
    }

    this.deps.logger.info('reviews.submit.start', {
      flow: 'reviews.submit',
      requestId: ctx.requestId,
      userId: input.userId,
      movieId: input.movieId,
    });

    const result = await withConflictRetry(
      () =>
        this.deps.db.transaction().execute(async (trx): Promise<SubmitTxResult> => {
          // Lock order: user (share) -> movie, so account deletion cannot interleave.
          const user = await lockUser(trx, input.userId, 'share');
          if (!user) throw ReviewErrors.userNotFound({ userId: input.userId });

          const movie = await lockMovieForUpdate(trx, input.movieId);
          if (!movie) throw ReviewErrors.movieNotFound({ movieId: input.movieId });

          const repo = this.reviewRepo.withDb(trx);
          const existing = await selectReviewByUserAndMovieSql(trx, input);

          if (input.mediaRef !== null) {
            const linkedTo = await selectReviewIdByMediaRefSql(trx, input.mediaRef);
            if (linkedTo !== undefined && linkedTo !== existing?.id) {
              throw ReviewErrors.mediaAlreadyLinked({ mediaRef: input.mediaRef });
            }
          }

          const fields = {
            rating: input.rating,
            title: input.title,
            body: input.body,
            mediaRef: input.mediaRef,
          };

          const row = existing
            ? await repo.updateReview(existing.id, fields)
            : await repo.insertReview({ userId: input.userId, movieId: input.movieId, ...fields });

          const aggregate = await recomputeMovieRating(trx, repo, input.movieId);

          return {
            review: toReview(row),
            created: !existing,
            aggregate,
            replacedMediaRef: existing?.media_ref ?? null,
          };
        }),
      {
        flow: 'reviews.submit',
        logger: this.deps.logger,
        onConflict: () =>
          ReviewErrors.concurrentSubmit({ userId: input.userId, movieId: input.movieId }),
      },
    );

    if (result.replacedMediaRef !== null && result.replacedMediaRef !== input.mediaRef) {
      await this.deps.mediaService.release([result.replacedMediaRef], {
        flow: 'reviews.submit',
        requestId: ctx.requestId,
      });
    }

    this.deps.logger.info('reviews.submit.success', {
      flow: 'reviews.submit',
      requestId: ctx.requestId,
      reviewId: result.review.id,
      movieId: input.movieId,
      created: result.created,
      count: result.aggregate.count,
    });

    return { review: result.review, created: result.created, aggregate: result.aggregate };
  }

  async delete(
    rawReviewId: string,
    rawRequestingUserId: string,
    ctx: LogContext = {},
  ): Promise<void> {
    const reviewId = parseId(rawReviewId, 'reviewId');
    const requestingUserId = parseId(rawRequestingUserId, 'userId');

    const removed = await this.deps.db.transaction().execute(async (trx) => {
      const found = await selectReviewByIdSql(trx, reviewId);
      if (!found) throw ReviewErrors.reviewNotFound({ reviewId });

      // Lock order is always movie -> review, same as submit.
      await lockMovieForUpdate(trx, found.movie_id);

      const row = await selectReviewByIdSql(trx, reviewId, { forUpdate: true });
      if (!row) throw ReviewErrors.reviewNotFound({ reviewId });

      const review = toReview(row);
      assertReviewAuthor(review, requestingUserId);

      const repo = this.reviewRepo.withDb(trx);
      await repo.deleteReview(review.id);
      await recomputeMovieRating(trx, repo, review.movieId);

      return review;
    });

    if (removed.mediaRef !== null) {
      await this.deps.mediaService.release([removed.mediaRef], {
        flow: 'reviews.delete',
        requestId: ctx.requestId,
      });
    }

    this.deps.logger.info('reviews.delete.success', {
      flow: 'reviews.delete',
      requestId: ctx.requestId,
      reviewId,
      movieId: removed.movieId,
    });
  }

  /**
   * Reviews for one movie, newest first. Throws NotFound for an unknown movie
   * before any listing is produced; the returned sequence itself is lazy.
   */
  async listForMovie(
    rawMovieId: string,
    opts: ListReviewsOptions = {},
  ): Promise<AsyncIterable<ReviewListing>> {
    const movieId = parseId(rawMovieId, 'movieId');
    const pageSize = resolvePageSize(opts);

    const movie = await getMovieById(this.deps.db, movieId);
    if (!movie) throw ReviewErrors.movieNotFound({ movieId });

    return reviewListings(this.deps.db, { movieId, pageSize });
  }

  /** Site-wide feed, newest first. */
  listRecent(opts: ListReviewsOptions = {}): AsyncIterable<ReviewListing> {
    return reviewListings(this.deps.db, { movieId: null, pageSize: resolvePageSize(opts) });
  }

  async getReview(rawReviewId: string): Promise<ReviewListing> {
    const reviewId = parseId(rawReviewId, 'reviewId');

    const listing = await getReviewListingById(this.deps.db, reviewId);
    if (!listing) throw ReviewErrors.reviewNotFound({ reviewId });

    return listing;
  }

  async aggregateFor(rawMovieId: string): Promise<AggregateRating> {
    const movieId = parseId(rawMovieId, 'movieId');

    const movie = await getMovieById(this.deps.db, movieId);
    if (!movie) throw ReviewErrors.movieNotFound({ movieId });

    return getAggregateRating(this.deps.db, movieId);
  }

  /** Reviews currently referencing the movie, read through the caller's executor. */
  async countForMovie(db: DbExecutor, movieId: string): Promise<number> {
    return countReviewsForMovieSql(db, movieId);
  }

  /**
   * Removes every review by `userId` inside the caller's transaction and
   * recomputes each affected movie. Returns media refs to release after commit.
   */
  async cascadeDeleteUser(trx: DbExecutor, userId: string): Promise<string[]> {
    const movieIds = await selectMovieIdsReviewedByUserSql(trx, userId);
    await lockMoviesInOrder(trx, movieIds);

    const repo = this.reviewRepo.withDb(trx);
    const removed = await repo.deleteReviewsByUser(userId);

    for (const movieId of [...new Set(removed.map((r) => r.movieId))].sort()) {
      await recomputeMovieRating(trx, repo, movieId);
    }

    this.deps.logger.info('reviews.cascade.user', {
      flow: 'reviews.cascade',
      userId,
      removedReviews: removed.length,
      affectedMovies: movieIds.length,
    });

    return removed.flatMap((r) => (r.mediaRef !== null ? [r.mediaRef] : []));
  }

  /**
   * Removes every review of `movieId` inside the caller's transaction.
   * Returns media refs to release after commit.
   */
  async cascadeDeleteMovie(trx: DbExecutor, movieId: string): Promise<string[]> {
    await lockMovieForUpdate(trx, movieId);

    const repo = this.reviewRepo.withDb(trx);
    const removed = await repo.deleteReviewsByMovie(movieId);
    await recomputeMovieRating(trx, repo, movieId);

    this.deps.logger.info('reviews.cascade.movie', {
      flow: 'reviews.cascade',
      movieId,
      removedReviews: removed.length,
    });

    return removed.flatMap((r) => (r.mediaRef !== null ? [r.mediaRef] : []));
  }
}
