/**
 * backend/src/modules/reviews/index.ts
 *
 * Public surface of the reviews module.
 */

export type { ReviewService } from './review.service';
export type {
  AggregateRating,
  Review,
  ReviewId,
  ReviewListing,
  SubmitReviewParams,
  SubmitReviewResult,
} from './review.types';
