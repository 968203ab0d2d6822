/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - The core never parses credentials from a request; it only receives a UserId.
 * - This is the request-side half of that contract: the session middleware fills
 *   it in, controllers read it (via requireSession) and pass userId explicitly.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an anonymous context on every request.
 * 2. Session middleware overwrites it if a valid session cookie exists.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

export type AuthContext = {
  userId: string | null;
  username: string | null;
  sessionId: string | null;
  isAdmin: boolean;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function anonymousAuthContext(): AuthContext {
  return {
    userId: null,
    username: null,
    sessionId: null,
    isAdmin: false,
  };
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = anonymousAuthContext();
    done();
  });
}
