/**
 * src/modules/movies/movie.module.ts
 *
 * WHY:
 * - Encapsulates Catalog wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { MediaService } from '../media';
import type { ReviewService } from '../reviews';

import { MovieService } from './movie.service';
import { MovieController } from './movie.controller';
import { registerMovieRoutes } from './movie.routes';

export type MovieModule = ReturnType<typeof createMovieModule>;

export function createMovieModule(deps: {
  db: DbExecutor;
  logger: Logger;
  reviewService: ReviewService;
  mediaService: MediaService;
}) {
  const movieService = new MovieService(deps);
  const controller = new MovieController(movieService);

  return {
    movieService,
    registerRoutes(app: FastifyInstance) {
      registerMovieRoutes(app, controller);
    },
  };
}
