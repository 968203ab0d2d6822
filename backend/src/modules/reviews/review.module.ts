/**
 * src/modules/reviews/review.module.ts
 *
 * WHY:
 * - Encapsulates Review Ledger wiring.
 * - The users and movies modules receive reviewService to run their cascades.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { MediaService } from '../media';

import { ReviewService } from './review.service';
import { ReviewController } from './review.controller';
import { registerReviewRoutes } from './review.routes';

export type ReviewModule = ReturnType<typeof createReviewModule>;

export function createReviewModule(deps: {
  db: DbExecutor;
  logger: Logger;
  mediaService: MediaService;
}) {
  const reviewService = new ReviewService(deps);
  const controller = new ReviewController(reviewService);

  return {
    reviewService,
    registerRoutes(app: FastifyInstance) {
      registerReviewRoutes(app, controller);
    },
  };
}
