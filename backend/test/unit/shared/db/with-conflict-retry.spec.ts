import { describe, it, expect, vi } from 'vitest';
import { withConflictRetry } from '../../../../src/shared/db/with-conflict-retry';
import {
  isTransientConflict,
  isUniqueViolation,
  pgErrorCode,
} from '../../../../src/shared/db/pg-errors';
import { AppError } from '../../../../src/shared/http/errors';
import { logger } from '../../../../src/shared/logger/logger';

function pgError(code: string): Error & { code: string } {
  return Object.assign(new Error(`pg ${code}`), { code });
}

const opts = {
  flow: 'test.retry',
  logger,
  onConflict: () => AppError.conflict('lost the race'),
};

describe('pg-errors', () => {
  it('reads SQLSTATE codes from driver errors', () => {
    expect(pgErrorCode(pgError('23505'))).toBe('23505');
    expect(pgErrorCode(new Error('plain'))).toBeNull();
    expect(pgErrorCode('23505')).toBeNull();
  });

  it('classifies unique, serialization and deadlock errors as transient', () => {
    expect(isUniqueViolation(pgError('23505'))).toBe(true);
    expect(isTransientConflict(pgError('23505'))).toBe(true);
    expect(isTransientConflict(pgError('40001'))).toBe(true);
    expect(isTransientConflict(pgError('40P01'))).toBe(true);
    expect(isTransientConflict(pgError('23503'))).toBe(false);
  });
});

describe('withConflictRetry', () => {
  it('returns the first result when nothing conflicts', async () => {
    const work = vi.fn().mockResolvedValue('ok');

    await expect(withConflictRetry(work, opts)).resolves.toBe('ok');
    expect(work).toHaveBeenCalledTimes(1);
  });

  it('retries once after a unique violation', async () => {
    const work = vi.fn().mockRejectedValueOnce(pgError('23505')).mockResolvedValueOnce('second');

    await expect(withConflictRetry(work, opts)).resolves.toBe('second');
    expect(work).toHaveBeenCalledTimes(2);
  });

  it('maps a repeated unique violation to the caller conflict error', async () => {
    const work = vi.fn().mockRejectedValue(pgError('23505'));

    await expect(withConflictRetry(work, opts)).rejects.toMatchObject({
      code: 'CONFLICT',
      message: 'lost the race',
    });
    expect(work).toHaveBeenCalledTimes(2);
  });

  it('rethrows a non-unique failure on the retry as-is', async () => {
    const second = pgError('40001');
    const work = vi.fn().mockRejectedValueOnce(pgError('40001')).mockRejectedValueOnce(second);

    await expect(withConflictRetry(work, opts)).rejects.toBe(second);
  });

  it('does not retry other errors', async () => {
    const boom = new Error('boom');
    const work = vi.fn().mockRejectedValue(boom);

    await expect(withConflictRetry(work, opts)).rejects.toBe(boom);
    expect(work).toHaveBeenCalledTimes(1);
  });
});
