/**
 * backend/src/modules/movies/movie.errors.ts
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const MovieErrors = {
  movieNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Movie not found.', meta);
  },

  invalidMovie(reason: string, meta?: AppErrorMeta) {
    return AppError.validationError(reason, meta);
  },

  /** Removal without cascade while reviews still reference the movie. */
  movieHasReviews(meta?: AppErrorMeta) {
    return AppError.conflict(
      'This movie has reviews. Remove it with cascade to delete them as well.',
      meta,
    );
  },
} as const;
