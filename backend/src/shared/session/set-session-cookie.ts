/**
 * backend/src/shared/session/set-session-cookie.ts
 *
 * WHY:
 * - Login, logout and account deletion all set or clear the same `sid` cookie.
 *   Flags are built in one place from SessionCookieOptions.
 *
 * RULES:
 * - No business logic here.
 * - The cookie lives exactly as long as the server-side session (Max-Age = session TTL).
 * - Secure is decided by the composition root, never by reading NODE_ENV here.
 */

import type { FastifyReply } from 'fastify';
import { SESSION_COOKIE_NAME } from './session.types';

export type SessionCookieOptions = Readonly<{
  secure: boolean;
  maxAgeSeconds: number;
}>;

function buildCookie(value: string, maxAgeSeconds: number, secure: boolean): string {
  const parts = [
    `${SESSION_COOKIE_NAME}=${value}`,
    'Path=/',
    'HttpOnly',
    'SameSite=Strict',
    `Max-Age=${maxAgeSeconds}`,
  ];

  if (secure) parts.push('Secure');

  return parts.join('; ');
}

export function setSessionCookie(
  reply: FastifyReply,
  sessionId: string,
  opts: SessionCookieOptions,
): void {
  reply.header('Set-Cookie', buildCookie(sessionId, opts.maxAgeSeconds, opts.secure));
}

/** Max-Age=0 makes the browser drop the cookie immediately. */
export function clearSessionCookie(reply: FastifyReply, opts: SessionCookieOptions): void {
  reply.header('Set-Cookie', buildCookie('', 0, opts.secure));
}
