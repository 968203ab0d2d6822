/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Request-scoped log lines carry requestId and, once the session middleware
 *   has run, the caller's userId and username.
 *
 * HOW TO USE:
 * - In a hook or handler: `withRequestContext(req).warn('msg', { flow: '...' })`
 * - Services do not use this; they receive `{ requestId }` as LogContext.
 */

import type { FastifyRequest } from 'fastify';
import { logger } from './logger';

type LogMeta = Record<string, unknown>;

export type RequestLogger = {
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
  debug: (msg: string, meta?: LogMeta) => void;
};

export function withRequestContext(req: FastifyRequest): RequestLogger {
  // Both contexts are decorated with null and filled by onRequest hooks.
  const base = {
    requestId: req.requestContext?.requestId,
    userId: req.authContext?.userId ?? null,
    username: req.authContext?.username ?? null,
  };

  const at =
    (level: 'info' | 'warn' | 'error' | 'debug') =>
    (msg: string, meta: LogMeta = {}) => {
      logger.log(level, msg, { ...base, ...meta });
    };

  return {
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
    debug: at('debug'),
  };
}
