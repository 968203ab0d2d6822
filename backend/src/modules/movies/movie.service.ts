/**
 * backend/src/modules/movies/movie.service.ts
 *
 * WHY:
 * - Catalog: movies that reviews attach to.
 *
 * RULES:
 * - Service owns transactions.
 * - Removing a reviewed movie goes through ReviewService.cascadeDeleteMovie inside
 *   this service's transaction, so reviews, aggregate and movie disappear together.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { LogContext, Logger } from '../../shared/logger/logger';
import { parseId } from '../../shared/validation/ids';
import type { MediaService } from '../media';
import type { ReviewService } from '../reviews';

import { MovieRepo } from './dal/movie.repo';
import { getMovieById, listMovies, lockMovieForUpdate, toMovie } from './queries/movie.queries';
import { assertValidMovieInput, normalizeMovieInput } from './policies/movie-input.policy';
import { MovieErrors } from './movie.errors';
import type {
  AddMovieAttributes,
  Movie,
  MovieWithRating,
  RemoveMovieOptions,
} from './movie.types';

export class MovieService {
  private readonly movieRepo: MovieRepo;

  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      reviewService: ReviewService;
      mediaService: MediaService;
    },
  ) {
    this.movieRepo = new MovieRepo(deps.db);
  }

  async addMovie(
    title: string,
    attrs: AddMovieAttributes = {},
    ctx: LogContext = {},
  ): Promise<Movie> {
    const input = normalizeMovieInput({ title, ...attrs });
    assertValidMovieInput(input);

    const row = await this.movieRepo.insertMovie(input);

    this.deps.logger.info('movies.add.success', {
      flow: 'movies.add',
      requestId: ctx.requestId,
      movieId: row.id,
    });

    return toMovie(row);
  }

  async getMovie(rawMovieId: string): Promise<MovieWithRating> {
    const movieId = parseId(rawMovieId, 'movieId');

    const movie = await getMovieById(this.deps.db, movieId);
    if (!movie) throw MovieErrors.movieNotFound({ movieId });

    const rating = await this.deps.reviewService.aggregateFor(movieId);
    return { ...movie, rating };
  }

  async listMovies(): Promise<Movie[]> {
    return listMovies(this.deps.db);
  }

  async removeMovie(
    rawMovieId: string,
    opts: RemoveMovieOptions = {},
    ctx: LogContext = {},
  ): Promise<void> {
    const movieId = parseId(rawMovieId, 'movieId');

    this.deps.logger.info('movies.remove.start', {
      flow: 'movies.remove',
      requestId: ctx.requestId,
      movieId,
      cascade: opts.cascade === true,
    });

    const releasedMedia = await this.deps.db.transaction().execute(async (trx) => {
      const movie = await lockMovieForUpdate(trx, movieId);
      if (!movie) throw MovieErrors.movieNotFound({ movieId });

      let refs: string[] = [];

      if (opts.cascade) {
        refs = await this.deps.reviewService.cascadeDeleteMovie(trx, movieId);
      } else {
        const reviewCount = await this.deps.reviewService.countForMovie(trx, movieId);
        if (reviewCount > 0) throw MovieErrors.movieHasReviews({ movieId, reviewCount });
      }

      await this.movieRepo.withDb(trx).deleteMovie(movieId);
      return refs;
    });

    await this.deps.mediaService.release(releasedMedia, {
      flow: 'movies.remove',
      requestId: ctx.requestId,
    });

    this.deps.logger.info('movies.remove.success', {
      flow: 'movies.remove',
      requestId: ctx.requestId,
      movieId,
      releasedMedia: releasedMedia.length,
    });
  }
}
