/**
 * backend/src/shared/http/parse-request.ts
 *
 * WHY:
 * - Every controller validates params/query/body the same way: Zod safeParse,
 *   then a VALIDATION_ERROR carrying the issues (logged, never sent to clients).
 */

import type { z } from 'zod';
import { AppError } from './errors';

export function parseRequest<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  message = 'Invalid request body',
): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw AppError.validationError(message, { issues: parsed.error.issues });
  }
  return parsed.data;
}
