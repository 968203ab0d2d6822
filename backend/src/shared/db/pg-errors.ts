/**
 * backend/src/shared/db/pg-errors.ts
 *
 * WHY:
 * - Services need to tell "a concurrent writer beat us" apart from real failures.
 * - Both node-postgres and in-process Postgres surface the SQLSTATE as `err.code`.
 *
 * RULES:
 * - Pure predicates. No AppError here.
 */

export const PG_UNIQUE_VIOLATION = '23505';
export const PG_FOREIGN_KEY_VIOLATION = '23503';
export const PG_SERIALIZATION_FAILURE = '40001';
export const PG_DEADLOCK_DETECTED = '40P01';

export function pgErrorCode(err: unknown): string | null {
  if (typeof err !== 'object' || err === null || !('code' in err)) return null;
  return typeof err.code === 'string' ? err.code : null;
}

export function isUniqueViolation(err: unknown): boolean {
  return pgErrorCode(err) === PG_UNIQUE_VIOLATION;
}

export function isForeignKeyViolation(err: unknown): boolean {
  return pgErrorCode(err) === PG_FOREIGN_KEY_VIOLATION;
}

/** Errors that a fresh attempt of the same transaction can succeed past. */
export function isTransientConflict(err: unknown): boolean {
  const code = pgErrorCode(err);
  return (
    code === PG_UNIQUE_VIOLATION || code === PG_SERIALIZATION_FAILURE || code === PG_DEADLOCK_DETECTED
  );
}
