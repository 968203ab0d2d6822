/**
 * backend/src/shared/validation/ids.ts
 *
 * WHY:
 * - Every id in the system is a Postgres uuid. A malformed id is an input
 *   error (400), not a lookup miss (404) and never a driver error (500).
 *
 * RULES:
 * - Call before the id reaches SQL, and use the returned value from then on.
 * - Postgres hands uuids back lowercased; parseId returns that same form so ids
 *   read from the DB and ids passed in by a caller compare equal.
 */

import { z } from 'zod';

import { AppError } from '../http/errors';

const idSchema = z.string().uuid();

function isValidId(value: string): boolean {
  return idSchema.safeParse(value).success;
}

export function parseId(value: string, field: string): string {
  if (!isValidId(value)) {
    throw AppError.validationError(`Invalid ${field}.`, { field });
  }
  return value.toLowerCase();
}
