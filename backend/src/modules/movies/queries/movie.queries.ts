/**
 * backend/src/modules/movies/queries/movie.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into Movie domain types.
 *
 * RULES:
 * - Read-only (the FOR UPDATE lock is a read that reserves the row).
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  selectMovieByIdSql,
  selectMovieByTitleSql,
  selectMovieForUpdateSql,
  selectMoviesSql,
} from '../dal/movie.query-sql';
import type { MovieRow } from '../dal/movie.query-sql';
import type { Movie } from '../movie.types';

export function toMovie(row: MovieRow): Movie {
  return {
    id: row.id,
    title: row.title,
    releaseYear: row.release_year,
    genre: row.genre,
    createdAt: row.created_at,
  };
}

export async function getMovieById(db: DbExecutor, movieId: string): Promise<Movie | undefined> {
  const row = await selectMovieByIdSql(db, movieId);
  if (!row) return undefined;
  return toMovie(row);
}

export async function lockMovieForUpdate(
  db: DbExecutor,
  movieId: string,
): Promise<Movie | undefined> {
  const row = await selectMovieForUpdateSql(db, movieId);
  if (!row) return undefined;
  return toMovie(row);
}

export async function listMovies(db: DbExecutor): Promise<Movie[]> {
  const rows = await selectMoviesSql(db);
  return rows.map(toMovie);
}

/** Oldest movie with exactly this title (titles are not unique). */
export async function findMovieByTitle(db: DbExecutor, title: string): Promise<Movie | undefined> {
  const row = await selectMovieByTitleSql(db, title);
  if (!row) return undefined;
  return toMovie(row);
}
