/**
 * backend/src/modules/reviews/policies/review-input.policy.ts
 *
 * WHY:
 * - Rating and text rules for a submission, and listing page size, as pure functions.
 *
 * RULES:
 * - Pure: no DB, no logging.
 * - Blank title/body are stored as null.
 */

import {
  RATING_MAX,
  RATING_MIN,
  REVIEW_BODY_MAX_LENGTH,
  REVIEW_LIST_PAGE_SIZE,
  REVIEW_TITLE_MAX_LENGTH,
} from '../review.constants';
import { ReviewErrors } from '../review.errors';

export type NormalizedReviewText = {
  title: string | null;
  body: string | null;
};

export function normalizeReviewText(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function getRatingFailure(rating: number): string | null {
  if (!Number.isInteger(rating) || rating < RATING_MIN || rating > RATING_MAX) {
    return `Rating must be a whole number from ${RATING_MIN} to ${RATING_MAX}.`;
  }
  return null;
}

export function getReviewTextFailure(text: NormalizedReviewText): string | null {
  if (text.title !== null && text.title.length > REVIEW_TITLE_MAX_LENGTH) {
    return `Title must be at most ${REVIEW_TITLE_MAX_LENGTH} characters.`;
  }

  if (text.body !== null && text.body.length > REVIEW_BODY_MAX_LENGTH) {
    return `Review text must be at most ${REVIEW_BODY_MAX_LENGTH} characters.`;
  }

  return null;
}

export function assertValidReviewInput(input: { rating: number } & NormalizedReviewText): void {
  const ratingFailure = getRatingFailure(input.rating);
  if (ratingFailure) throw ReviewErrors.invalidReview(ratingFailure, { field: 'rating' });

  const textFailure = getReviewTextFailure(input);
  if (textFailure) throw ReviewErrors.invalidReview(textFailure, { field: 'text' });
}

/** Keyset pages need a positive size; anything else would never advance. */
export function resolvePageSize(opts: { pageSize?: number }): number {
  const pageSize = opts.pageSize ?? REVIEW_LIST_PAGE_SIZE;
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw ReviewErrors.invalidReview('Page size must be a positive whole number.', {
      field: 'pageSize',
    });
  }
  return pageSize;
}
