/**
 * backend/src/modules/movies/policies/movie-input.policy.ts
 *
 * WHY:
 * - Catalog entry rules, as pure functions.
 */

import { MOVIE_RULES } from '../movie.constants';
import { MovieErrors } from '../movie.errors';

export type NormalizedMovieInput = {
  title: string;
  releaseYear: number | null;
  genre: string | null;
};

export function normalizeMovieInput(input: {
  title: string;
  releaseYear?: number | null;
  genre?: string | null;
}): NormalizedMovieInput {
  const genre = input.genre?.trim() ?? '';

  return {
    title: input.title.trim(),
    releaseYear: input.releaseYear ?? null,
    genre: genre.length > 0 ? genre : null,
  };
}

export function getMovieInputFailure(input: NormalizedMovieInput): string | null {
  if (input.title.length === 0) return 'Title is required.';

  if (input.title.length > MOVIE_RULES.titleMaxLength) {
    return `Title must be at most ${MOVIE_RULES.titleMaxLength} characters.`;
  }

  if (input.releaseYear !== null) {
    const { min, max } = MOVIE_RULES.releaseYear;
    if (!Number.isInteger(input.releaseYear) || input.releaseYear < min || input.releaseYear > max) {
      return `Release year must be a whole number from ${min} to ${max}.`;
    }
  }

  if (input.genre !== null && input.genre.length > MOVIE_RULES.genreMaxLength) {
    return `Genre must be at most ${MOVIE_RULES.genreMaxLength} characters.`;
  }

  return null;
}

export function assertValidMovieInput(input: NormalizedMovieInput): void {
  const failure = getMovieInputFailure(input);
  if (failure) throw MovieErrors.invalidMovie(failure);
}
