/**
 * src/modules/reviews/review.routes.ts
 *
 * WHY:
 * - Declares Review Ledger endpoints.
 *
 * RULES:
 * - No business logic here.
 * - /reviews/recent is a static route and wins over /reviews/:reviewId.
 */

import type { FastifyInstance } from 'fastify';
import type { ReviewController } from './review.controller';

export function registerReviewRoutes(app: FastifyInstance, controller: ReviewController) {
  app.get('/movies/:movieId/reviews', controller.listForMovie.bind(controller));
  app.post('/movies/:movieId/reviews', controller.submit.bind(controller));
  app.get('/movies/:movieId/rating', controller.aggregate.bind(controller));

  app.get('/reviews/recent', controller.listRecent.bind(controller));
  app.get('/reviews/:reviewId', controller.get.bind(controller));
  app.delete('/reviews/:reviewId', controller.delete.bind(controller));
}
