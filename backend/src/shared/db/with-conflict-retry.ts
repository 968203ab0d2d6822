/**
 * backend/src/shared/db/with-conflict-retry.ts
 *
 * WHY:
 * - A race on first write (two requests inserting the same unique key) surfaces as
 *   a unique violation from the loser. Re-running the whole unit of work re-reads
 *   the winner's row and turns the insert into an update.
 *
 * RULES:
 * - Exactly one retry. The callback must open its own transaction so the retry
 *   starts from a clean snapshot.
 * - If the retry still violates a unique constraint, the caller gets `onConflict()`
 *   (an AppError of its choosing) instead of a raw driver error.
 * - Any other error propagates untouched.
 */

import type { Logger } from '../logger/logger';
import { isTransientConflict, isUniqueViolation, pgErrorCode } from './pg-errors';

export async function withConflictRetry<T>(
  work: () => Promise<T>,
  opts: { flow: string; logger: Logger; onConflict: () => Error },
): Promise<T> {
  try {
    return await work();
  } catch (err) {
    if (!isTransientConflict(err)) throw err;

    opts.logger.info(`${opts.flow}.retry`, {
      flow: opts.flow,
      sqlState: pgErrorCode(err),
    });
  }

  try {
    return await work();
  } catch (err) {
    if (isUniqueViolation(err)) throw opts.onConflict();
    throw err;
  }
}
