/**
 * backend/src/shared/session/session.middleware.ts
 *
 * WHY:
 * - This is the Auth Gateway: it resolves a request to a UserId.
 * - Reads the session cookie on every request and populates req.authContext.
 * - Does NOT throw if there is no session; endpoints decide if auth is required.
 *
 * RULES:
 * - Runs AFTER requestContext and authContext hooks.
 * - Best-effort: missing/invalid/expired cookie leaves the context anonymous.
 * - No business logic (just session → authContext mapping).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { SessionStore } from './session.store';
import { SESSION_COOKIE_NAME } from './session.types';

/**
 * Parses a raw Cookie header into key-value pairs.
 * Handles the standard format: "key1=value1; key2=value2"
 */
export function parseCookies(raw: string | undefined): Record<string, string> {
  if (!raw) return {};

  const cookies: Record<string, string> = {};
  for (const pair of raw.split(';')) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) continue;

    const key = pair.substring(0, eqIdx).trim();
    const value = pair.substring(eqIdx + 1).trim();
    if (key) cookies[key] = value;
  }
  return cookies;
}

export function registerSessionMiddleware(
  app: FastifyInstance,
  opts: { sessionStore: SessionStore; adminUsernames: readonly string[] },
): void {
  const admins = new Set(opts.adminUsernames.map((u) => u.toLowerCase()));

  app.addHook('onRequest', async (req: FastifyRequest) => {
    const cookies = parseCookies(req.headers.cookie);
    const sessionId = cookies[SESSION_COOKIE_NAME];
    if (!sessionId) return;

    const session = await opts.sessionStore.get(sessionId);
    if (!session) return;

    req.authContext = {
      userId: session.userId,
      username: session.username,
      sessionId,
      isAdmin: admins.has(session.username.toLowerCase()),
    };
  });
}
