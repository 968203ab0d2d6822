/**
 * backend/src/modules/reviews/review.errors.ts
 *
 * WHY:
 * - Reviews module owns its domain-specific error semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const ReviewErrors = {
  reviewNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Review not found.', meta);
  },

  movieNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Movie not found.', meta);
  },

  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found.', meta);
  },

  /** Write-then-link: the referenced bytes must already be in the media store. */
  mediaNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Attached media not found. Upload it first.', meta);
  },

  mediaAlreadyLinked(meta?: AppErrorMeta) {
    return AppError.conflict('This media is already attached to another review.', meta);
  },

  notAuthor(meta?: AppErrorMeta) {
    return AppError.forbidden('You can only delete your own reviews.', meta);
  },

  invalidReview(reason: string, meta?: AppErrorMeta) {
    return AppError.validationError(reason, meta);
  },

  /** A concurrent submit for the same (user, movie) kept winning. */
  concurrentSubmit(meta?: AppErrorMeta) {
    return AppError.conflict('Another submission for this movie is in progress. Try again.', meta);
  },
} as const;
