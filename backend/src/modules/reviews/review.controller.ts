/**
 * src/modules/reviews/review.controller.ts
 *
 * WHY:
 * - Maps HTTP → ReviewService.
 * - The acting user comes from the session (requireSession) and is passed explicitly.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { parseRequest } from '../../shared/http/parse-request';
import { requireSession } from '../../shared/http/require-auth-context';
import { takeListings } from './queries/review.queries';
import type { ReviewService } from './review.service';
import {
  listReviewsQuerySchema,
  movieParamsSchema,
  reviewParamsSchema,
  submitReviewSchema,
} from './review.schemas';

export class ReviewController {
  constructor(private readonly reviewService: ReviewService) {}

  async listForMovie(req: FastifyRequest, reply: FastifyReply) {
    const { movieId } = parseRequest(movieParamsSchema, req.params, 'Invalid movie id');
    const { limit } = parseRequest(listReviewsQuerySchema, req.query, 'Invalid query string');

    const listings = await this.reviewService.listForMovie(movieId, { pageSize: limit });
    const reviews = await takeListings(listings, limit);

    return reply.status(200).send({ reviews });
  }

  async listRecent(req: FastifyRequest, reply: FastifyReply) {
    const { limit } = parseRequest(listReviewsQuerySchema, req.query, 'Invalid query string');

    const reviews = await takeListings(this.reviewService.listRecent({ pageSize: limit }), limit);

    return reply.status(200).send({ reviews });
  }

  async submit(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    const { movieId } = parseRequest(movieParamsSchema, req.params, 'Invalid movie id');
    const body = parseRequest(submitReviewSchema, req.body);

    const result = await this.reviewService.submit(
      {
        userId: session.userId,
        movieId,
        rating: body.rating,
        title: body.title,
        body: body.body,
        mediaRef: body.mediaRef,
      },
      { requestId: req.requestContext.requestId },
    );

    return reply.status(result.created ? 201 : 200).send(result);
  }

  async aggregate(req: FastifyRequest, reply: FastifyReply) {
    const { movieId } = parseRequest(movieParamsSchema, req.params, 'Invalid movie id');

    const rating = await this.reviewService.aggregateFor(movieId);
    return reply.status(200).send(rating);
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const { reviewId } = parseRequest(reviewParamsSchema, req.params, 'Invalid review id');

    const review = await this.reviewService.getReview(reviewId);
    return reply.status(200).send(review);
  }

  async delete(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    const { reviewId } = parseRequest(reviewParamsSchema, req.params, 'Invalid review id');

    await this.reviewService.delete(reviewId, session.userId, {
      requestId: req.requestContext.requestId,
    });

    return reply.status(204).send();
  }
}
