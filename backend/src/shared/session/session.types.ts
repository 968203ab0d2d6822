/**
 * src/shared/session/session.types.ts
 *
 * WHY:
 * - Defines the server-side session data model.
 * - Sessions are stored in Redis (via Cache) with a TTL.
 * - Each session belongs to exactly one user.
 *
 * RULES:
 * - Session data must be JSON-serializable (stored as a JSON string).
 * - Session cookie is HttpOnly, Secure (prod), SameSite=Strict.
 * - Never store passwords or hashes in session data.
 */

import { z } from 'zod';

export const sessionDataSchema = z.object({
  userId: z.string().min(1),
  username: z.string().min(1),
  createdAt: z.string(), // ISO string (JSON-safe)
});

export type SessionData = z.infer<typeof sessionDataSchema>;

export const SESSION_COOKIE_NAME = 'sid';

/**
 * Session prefix in the cache. Full key: `session:{sessionId}`.
 */
export const SESSION_KEY_PREFIX = 'session';

/**
 * User-sessions index prefix. Full key: `session:user:{userId}`.
 * A SET of live session ids per user, used by destroyAllForUser() when the
 * account is deleted.
 */
export const SESSION_USER_INDEX_PREFIX = 'session:user';
