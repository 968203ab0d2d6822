/**
 * backend/src/modules/reviews/review.types.ts
 *
 * WHY:
 * - Domain types for the Review Ledger.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 *
 * STATE:
 * - Nonexistent -> Active (first submit)
 * - Active -> Active (resubmit: same id, fields overwritten)
 * - Active -> Deleted (delete / cascade; terminal, the id is never reused)
 */

import type { MediaReference } from '../media';

export type ReviewId = string;

export type Review = {
  id: ReviewId;
  userId: string;
  movieId: string;
  rating: number;
  title: string | null;
  body: string | null;
  mediaRef: MediaReference | null;
  createdAt: Date;
  updatedAt: Date;
};

/** A review as shown in listings: carries the author's username and the movie title. */
export type ReviewListing = Review & {
  username: string;
  movieTitle: string;
};

/** mean is null exactly when count is 0. */
export type AggregateRating = {
  movieId: string;
  count: number;
  mean: number | null;
};

export type SubmitReviewParams = {
  userId: string;
  movieId: string;
  rating: number;
  title?: string | null;
  body?: string | null;
  mediaRef?: MediaReference | null;
};

export type SubmitReviewResult = {
  review: Review;
  /** false when an existing review for (user, movie) was overwritten. */
  created: boolean;
  aggregate: AggregateRating;
};

export type ListReviewsOptions = {
  /** Rows fetched per round trip while iterating. */
  pageSize?: number;
};
