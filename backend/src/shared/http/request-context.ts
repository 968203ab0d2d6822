/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs, debugging and tracing.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 *
 * RULES:
 * - A well-formed incoming `x-request-id` (from a proxy) is reused; anything else
 *   is replaced by a fresh UUID. The id is echoed back in the response header.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
  userAgent: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

export const REQUEST_ID_HEADER = 'x-request-id';

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

function pickRequestId(incoming: string | string[] | undefined): string {
  if (typeof incoming === 'string' && REQUEST_ID_PATTERN.test(incoming)) return incoming;
  return randomUUID();
}

export function registerRequestContext(app: FastifyInstance) {
  // Decorate so Fastify knows the property exists; the real value is set per request.
  app.decorateRequest('requestContext', null);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, reply, done) => {
    req.requestContext = {
      requestId: pickRequestId(req.headers[REQUEST_ID_HEADER]),
      userAgent: req.headers['user-agent'] ?? null,
    };

    reply.header(REQUEST_ID_HEADER, req.requestContext.requestId);

    done();
  });
}
