import { describe, it, expect } from 'vitest';
import {
  assertValidReviewInput,
  getRatingFailure,
  getReviewTextFailure,
  normalizeReviewText,
} from '../../../src/modules/reviews/policies/review-input.policy';
import { catchError } from '../../helpers/catch-error';

const RATING_MESSAGE = 'Rating must be a whole number from 1 to 5.';

describe('review-input.policy', () => {
  it('accepts every whole rating from 1 to 5', () => {
    for (const rating of [1, 2, 3, 4, 5]) {
      expect(getRatingFailure(rating)).toBeNull();
    }
  });

  it('rejects out-of-range and fractional ratings', () => {
    expect(getRatingFailure(0)).toBe(RATING_MESSAGE);
    expect(getRatingFailure(6)).toBe(RATING_MESSAGE);
    expect(getRatingFailure(3.5)).toBe(RATING_MESSAGE);
    expect(getRatingFailure(Number.NaN)).toBe(RATING_MESSAGE);
  });

  it('normalizeReviewText trims and turns blank into null', () => {
    expect(normalizeReviewText('  Great film ')).toBe('Great film');
    expect(normalizeReviewText('   ')).toBeNull();
    expect(normalizeReviewText(undefined)).toBeNull();
    expect(normalizeReviewText(null)).toBeNull();
  });

  it('enforces the title and body ceilings', () => {
    expect(getReviewTextFailure({ title: 'a'.repeat(200), body: 'b'.repeat(5000) })).toBeNull();
    expect(getReviewTextFailure({ title: 'a'.repeat(201), body: null })).toBe(
      'Title must be at most 200 characters.',
    );
    expect(getReviewTextFailure({ title: null, body: 'b'.repeat(5001) })).toBe(
      'Review text must be at most 5000 characters.',
    );
  });

  it('assertValidReviewInput throws VALIDATION_ERROR for a bad rating', () => {
    const err = catchError(() => assertValidReviewInput({ rating: 6, title: null, body: null }));
    expect(err).toMatchObject({ code: 'VALIDATION_ERROR', message: RATING_MESSAGE });
  });
});
