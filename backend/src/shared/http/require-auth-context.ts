/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require session" logic.
 * - Centralizes authContext validation to prevent drift across endpoints.
 *
 * RULES:
 * - HTTP-only helper; takes anything carrying an authContext (a FastifyRequest does).
 * - Must NOT touch DB or services.
 * - Throws AppError so error-handler maps it consistently.
 */

import { AppError } from './errors';
import type { AuthContext } from './auth-context';

export type RequiredAuthContext = Readonly<{
  sessionId: string;
  userId: string;
  username: string;
  isAdmin: boolean;
}>;

/** The slice of a Fastify request the guard reads; decorated with null until onRequest runs. */
export type AuthContextCarrier = Readonly<{
  authContext: AuthContext | null;
}>;

export type RequireSessionOptions = Readonly<{
  admin?: boolean;
}>;

/**
 * Controller guard: requires a session, and optionally catalog-admin rights.
 *
 * Guard sequence:
 * 1) no session -> 401 "Authentication required"
 * 2) admin required but not admin -> 403 "Admin access required."
 */
export function requireSession(
  req: AuthContextCarrier,
  opts: RequireSessionOptions = {},
): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx) throw AppError.unauthorized('Authentication required');

  if (!ctx.sessionId || !ctx.userId || !ctx.username) {
    throw AppError.unauthorized('Authentication required');
  }

  if (opts.admin && !ctx.isAdmin) {
    throw AppError.forbidden('Admin access required.');
  }

  return {
    sessionId: ctx.sessionId,
    userId: ctx.userId,
    username: ctx.username,
    isAdmin: ctx.isAdmin,
  };
}
