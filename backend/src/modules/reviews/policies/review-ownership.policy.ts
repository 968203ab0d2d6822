/**
 * backend/src/modules/reviews/policies/review-ownership.policy.ts
 *
 * WHY:
 * - Only the author may delete a review.
 */

import { ReviewErrors } from '../review.errors';

export function isReviewAuthor(review: { userId: string }, requestingUserId: string): boolean {
  return review.userId === requestingUserId;
}

export function assertReviewAuthor(
  review: { id: string; userId: string },
  requestingUserId: string,
): void {
  if (!isReviewAuthor(review, requestingUserId)) {
    throw ReviewErrors.notAuthor({ reviewId: review.id, requestingUserId });
  }
}
