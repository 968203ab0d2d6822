/**
 * src/modules/movies/movie.routes.ts
 *
 * WHY:
 * - Declares Catalog endpoints.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { MovieController } from './movie.controller';

export function registerMovieRoutes(app: FastifyInstance, controller: MovieController) {
  app.get('/movies', controller.list.bind(controller));
  app.post('/movies', controller.add.bind(controller));
  app.get('/movies/:movieId', controller.get.bind(controller));

  app.delete('/admin/movies/:movieId', controller.remove.bind(controller));
}
