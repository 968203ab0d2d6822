/**
 * src/modules/reviews/review.schemas.ts
 *
 * WHY:
 * - Request shape validation for review endpoints.
 *
 * RULES:
 * - Shape only. Rating range and text limits are enforced by the service
 *   (policies/review-input.policy.ts) for every caller.
 */

import { z } from 'zod';
import { REVIEW_LIST_LIMIT } from './review.constants';

export const movieParamsSchema = z.object({
  movieId: z.string().min(1),
});

export const reviewParamsSchema = z.object({
  reviewId: z.string().min(1),
});

export const submitReviewSchema = z.object({
  rating: z.number({ invalid_type_error: 'Rating must be a number' }),
  title: z.string().nullish(),
  body: z.string().nullish(),
  mediaRef: z.string().nullish(),
});

export type SubmitReviewInput = z.infer<typeof submitReviewSchema>;

export const listReviewsQuerySchema = z.object({
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(REVIEW_LIST_LIMIT.max)
    .default(REVIEW_LIST_LIMIT.default),
});
