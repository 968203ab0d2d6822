/**
 * backend/src/modules/reviews/review.constants.ts
 *
 * RULES:
 * - RATING_* must match the reviews_rating_range CHECK in migration 0003.
 */

export const RATING_MIN = 1;
export const RATING_MAX = 5;

export const REVIEW_TITLE_MAX_LENGTH = 200;
export const REVIEW_BODY_MAX_LENGTH = 5000;

export const REVIEW_LIST_PAGE_SIZE = 50;

export const REVIEW_LIST_LIMIT = {
  default: 20,
  max: 100,
} as const;
