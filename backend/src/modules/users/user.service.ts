/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Credential Store: register, verify, delete accounts.
 * - Login/logout wrap verify with throttling and a server-side session.
 *
 * RULES:
 * - Only the bcrypt hash is stored; passwords never reach logs or errors.
 * - verify() costs one bcrypt comparison whether or not the username exists,
 *   so response time does not reveal registered usernames.
 * - Account deletion cascades through the review ledger in the same transaction;
 *   sessions and media are cleaned up after commit.
 */

import type { DbExecutor } from '../../shared/db/db';
import { isUniqueViolation } from '../../shared/db/pg-errors';
import type { LogContext, Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { SessionStore } from '../../shared/session/session.store';
import { parseId } from '../../shared/validation/ids';
import type { MediaService } from '../media';
import type { ReviewService } from '../reviews';

import type { UserRepo } from './dal/user.repo';
import {
  getUserById,
  getUserByUsername,
  getUserWithPasswordHash,
  lockUser,
} from './queries/user.queries';
import { assertValidCredentials, normalizeUsername } from './policies/credential-shape.policy';
import { USER_RATE_LIMITS } from './user.constants';
import { UserErrors } from './user.errors';
import type { LoginParams, LoginResult, User } from './user.types';

// Compared against when the username is unknown; never matches a real password.
const TIMING_DUMMY_PASSWORD = 'timing-equaliser-Not-A-Password-0';

export class UserService {
  private dummyHash: Promise<string> | null = null;

  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      passwordHasher: PasswordHasher;
      tokenHasher: TokenHasher;
      rateLimiter: RateLimiter;
      sessionStore: SessionStore;
      userRepo: UserRepo;
      reviewService: ReviewService;
      mediaService: MediaService;
    },
  ) {}

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = this.deps.passwordHasher.hash(TIMING_DUMMY_PASSWORD);
    }
    return this.dummyHash;
  }

  async register(username: string, password: string, ctx: LogContext = {}): Promise<User> {
    const normalized = normalizeUsername(username);
    assertValidCredentials({ username: normalized, password });

    const usernameKey = this.deps.tokenHasher.hash(normalized.toLowerCase());

    this.deps.logger.info('users.register.start', {
      flow: 'users.register',
      requestId: ctx.requestId,
      usernameKey,
    });

    const existing = await getUserByUsername(this.deps.db, normalized);
    if (existing) throw UserErrors.usernameTaken({ usernameKey });

    const passwordHash = await this.deps.passwordHasher.hash(password);

    let user: User;
    try {
      user = await this.deps.userRepo.insertUser({ username: normalized, passwordHash });
    } catch (err) {
      // Lost a race with a concurrent registration of the same name.
      if (isUniqueViolation(err)) throw UserErrors.usernameTaken({ usernameKey });
      throw err;
    }

    this.deps.logger.info('users.register.success', {
      flow: 'users.register',
      requestId: ctx.requestId,
      userId: user.id,
    });

    return user;
  }

  async verify(username: string, password: string): Promise<User> {
    const found = await getUserWithPasswordHash(this.deps.db, normalizeUsername(username));

    if (!found) {
      await this.deps.passwordHasher.verify(password, await this.getDummyHash());
      throw UserErrors.invalidCredentials();
    }

    const ok = await this.deps.passwordHasher.verify(password, found.passwordHash);
    if (!ok) throw UserErrors.invalidCredentials({ userId: found.id });

    return { id: found.id, username: found.username, createdAt: found.createdAt };
  }

  async login(params: LoginParams): Promise<LoginResult> {
    const usernameKey = this.deps.tokenHasher.hash(normalizeUsername(params.username).toLowerCase());

    this.deps.logger.info('users.login.start', {
      flow: 'users.login',
      requestId: params.requestId,
      usernameKey,
    });

    await this.deps.rateLimiter.hitOrThrow({
      key: `login:username:${usernameKey}`,
      ...USER_RATE_LIMITS.login.perUsername,
    });
    await this.deps.rateLimiter.hitOrThrow({
      key: `login:ip:${params.ip}`,
      ...USER_RATE_LIMITS.login.perIp,
    });

    let user: User;
    try {
      user = await this.verify(params.username, params.password);
    } catch (err) {
      this.deps.logger.warn('users.login.failed', {
        flow: 'users.login',
        requestId: params.requestId,
        usernameKey,
      });
      throw err;
    }

    const sessionId = await this.deps.sessionStore.create({
      userId: user.id,
      username: user.username,
      createdAt: new Date().toISOString(),
    });

    this.deps.logger.info('users.login.success', {
      flow: 'users.login',
      requestId: params.requestId,
      userId: user.id,
    });

    return { user, sessionId };
  }

  async logout(sessionId: string, ctx: LogContext = {}): Promise<void> {
    await this.deps.sessionStore.destroy(sessionId);

    this.deps.logger.info('users.logout.success', {
      flow: 'users.logout',
      requestId: ctx.requestId,
    });
  }

  async getUser(rawUserId: string): Promise<User> {
    const userId = parseId(rawUserId, 'userId');

    const user = await getUserById(this.deps.db, userId);
    if (!user) throw UserErrors.userNotFound({ userId });

    return user;
  }

  /**
   * Deletes the account and everything that hangs off it.
   * After this returns, the user is gone from every listing and aggregate.
   */
  async deleteAccount(rawUserId: string, ctx: LogContext = {}): Promise<void> {
    const userId = parseId(rawUserId, 'userId');

    this.deps.logger.info('users.delete.start', {
      flow: 'users.delete',
      requestId: ctx.requestId,
      userId,
    });

    const releasedMedia = await this.deps.db.transaction().execute(async (trx) => {
      // Blocks review writes by this user until the cascade commits.
      const user = await lockUser(trx, userId, 'update');
      if (!user) throw UserErrors.userNotFound({ userId });

      const refs = await this.deps.reviewService.cascadeDeleteUser(trx, userId);
      await this.deps.userRepo.withDb(trx).deleteUser(userId);

      return refs;
    });

    await this.deps.sessionStore.destroyAllForUser(userId);
    await this.deps.mediaService.release(releasedMedia, {
      flow: 'users.delete',
      requestId: ctx.requestId,
    });

    this.deps.logger.info('users.delete.success', {
      flow: 'users.delete',
      requestId: ctx.requestId,
      userId,
      releasedMedia: releasedMedia.length,
    });
  }
}
