/**
 * backend/src/modules/reviews/helpers/lock-movies.ts
 *
 * WHY:
 * - Cascades touch several movies. Locking them in one global order (by id)
 *   means two cascades can never wait on each other in a cycle.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { lockMovieForUpdate } from '../../movies';

export async function lockMoviesInOrder(trx: DbExecutor, movieIds: readonly string[]): Promise<void> {
  const ordered = [...new Set(movieIds)].sort();

  for (const movieId of ordered) {
    await lockMovieForUpdate(trx, movieId);
  }
}
