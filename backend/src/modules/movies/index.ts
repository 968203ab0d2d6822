/**
 * backend/src/modules/movies/index.ts
 *
 * WHY:
 * - Define the public surface of the movies module.
 * - The review ledger reads and locks movies through these; it never imports the DAL.
 *
 * RULES:
 * - Only export stable, read-only contracts needed by other modules.
 */

export { getMovieById, lockMovieForUpdate, findMovieByTitle } from './queries/movie.queries';
export type { Movie, MovieId } from './movie.types';
export type { MovieService } from './movie.service';
