/**
 * backend/src/modules/movies/movie.constants.ts
 */

export const MOVIE_RULES = {
  titleMaxLength: 200,
  genreMaxLength: 50,
  releaseYear: { min: 1870, max: 2100 },
} as const;
