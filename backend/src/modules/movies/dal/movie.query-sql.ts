/**
 * backend/src/modules/movies/dal/movie.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for movies.
 *
 * RULES:
 * - No AppError.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { Movies } from '../../../shared/db/schema.types';

export type MovieRow = Selectable<Movies>;

export async function selectMovieByIdSql(
  db: DbExecutor,
  movieId: string,
): Promise<MovieRow | undefined> {
  return db.selectFrom('movies').selectAll().where('id', '=', movieId).executeTakeFirst();
}

/**
 * Row lock on the movie. Every review mutation takes it first, which serialises
 * writers per movie and keeps the aggregate recompute race-free.
 * Must run inside a transaction.
 */
export async function selectMovieForUpdateSql(
  db: DbExecutor,
  movieId: string,
): Promise<MovieRow | undefined> {
  return db
    .selectFrom('movies')
    .selectAll()
    .where('id', '=', movieId)
    .forUpdate()
    .executeTakeFirst();
}

export async function selectMoviesSql(db: DbExecutor): Promise<MovieRow[]> {
  return db.selectFrom('movies').selectAll().orderBy('title').orderBy('id').execute();
}

export async function selectMovieByTitleSql(
  db: DbExecutor,
  title: string,
): Promise<MovieRow | undefined> {
  return db
    .selectFrom('movies')
    .selectAll()
    .where('title', '=', title)
    .orderBy('created_at')
    .executeTakeFirst();
}
