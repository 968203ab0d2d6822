/**
 * backend/src/modules/movies/dal/movie.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for movies.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { MovieRow } from './movie.query-sql';

export class MovieRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): MovieRepo {
    return new MovieRepo(db);
  }

  async insertMovie(params: {
    title: string;
    releaseYear: number | null;
    genre: string | null;
  }): Promise<MovieRow> {
    return this.db
      .insertInto('movies')
      .values({
        title: params.title,
        release_year: params.releaseYear,
        genre: params.genre,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  /**
   * Reviews reference movies with ON DELETE RESTRICT: callers cascade through the
   * review ledger first. movie_ratings goes with the movie (ON DELETE CASCADE).
   */
  async deleteMovie(movieId: string): Promise<boolean> {
    const res = await this.db.deleteFrom('movies').where('id', '=', movieId).executeTakeFirst();
    return res.numDeletedRows > 0n;
  }
}
