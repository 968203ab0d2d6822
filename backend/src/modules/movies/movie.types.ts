/**
 * backend/src/modules/movies/movie.types.ts
 *
 * WHY:
 * - Domain types for the Catalog.
 *
 * RULES:
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

import type { AggregateRating } from '../reviews';

export type MovieId = string;

export type Movie = {
  id: MovieId;
  title: string;
  releaseYear: number | null;
  genre: string | null;
  createdAt: Date;
};

export type MovieWithRating = Movie & {
  rating: AggregateRating;
};

export type AddMovieAttributes = {
  releaseYear?: number | null;
  genre?: string | null;
};

export type RemoveMovieOptions = {
  /** Delete the movie's reviews too. Without it, a reviewed movie cannot be removed. */
  cascade?: boolean;
};
