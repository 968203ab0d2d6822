/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Credential Store wiring and the /auth routes.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { SessionStore } from '../../shared/session/session.store';
import type { SessionCookieOptions } from '../../shared/session/set-session-cookie';
import type { MediaService } from '../media';
import type { ReviewService } from '../reviews';

import { UserRepo } from './dal/user.repo';
import { UserService } from './user.service';
import { UserController } from './user.controller';
import { registerUserRoutes } from './user.routes';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  db: DbExecutor;
  logger: Logger;
  passwordHasher: PasswordHasher;
  tokenHasher: TokenHasher;
  rateLimiter: RateLimiter;
  sessionStore: SessionStore;
  reviewService: ReviewService;
  mediaService: MediaService;
  sessionCookie: SessionCookieOptions;
}) {
  const userRepo = new UserRepo(deps.db);

  const userService = new UserService({
    db: deps.db,
    logger: deps.logger,
    passwordHasher: deps.passwordHasher,
    tokenHasher: deps.tokenHasher,
    rateLimiter: deps.rateLimiter,
    sessionStore: deps.sessionStore,
    userRepo,
    reviewService: deps.reviewService,
    mediaService: deps.mediaService,
  });

  const controller = new UserController(userService, deps.sessionCookie);

  return {
    userService,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller);
    },
  };
}
