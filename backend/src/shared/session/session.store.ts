/**
 * src/shared/session/session.store.ts
 *
 * WHY:
 * - Server-side session management through the Cache interface.
 * - Sessions are instantly revocable via del(); TTL is enforced by the cache.
 *
 * USER-SESSION INDEX:
 * - create(): SADD session:user:{userId} {sessionId} with TTL refresh.
 * - destroy(): SREM from the index, then DEL the session.
 * - destroyAllForUser(): SMEMBERS → DEL each → DEL the index.
 *
 * RULES:
 * - Depends only on Cache (Redis in prod, InMemCache in tests).
 * - No HTTP concerns here (cookie handling lives in middleware).
 */

import { randomUUID } from 'node:crypto';
import type { Cache } from '../cache/cache';
import type { Logger } from '../logger/logger';
import { sessionDataSchema } from './session.types';
import type { SessionData } from './session.types';
import { SESSION_KEY_PREFIX, SESSION_USER_INDEX_PREFIX } from './session.types';

export class SessionStore {
  constructor(
    private readonly cache: Cache,
    private readonly ttlSeconds: number,
    private readonly logger: Logger,
  ) {}

  private key(sessionId: string): string {
    return `${SESSION_KEY_PREFIX}:${sessionId}`;
  }

  private userIndexKey(userId: string): string {
    return `${SESSION_USER_INDEX_PREFIX}:${userId}`;
  }

  private parse(raw: string): SessionData | null {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.logger.warn('session.corrupted', { flow: 'session', reason: 'invalid_json', err });
      return null;
    }

    const parsed = sessionDataSchema.safeParse(json);
    return parsed.success ? parsed.data : null;
  }

  /**
   * Creates a new session and returns the session ID.
   * The caller is responsible for setting the cookie.
   */
  async create(data: SessionData): Promise<string> {
    const sessionId = randomUUID();

    await this.cache.set(this.key(sessionId), JSON.stringify(data), {
      ttlSeconds: this.ttlSeconds,
    });

    await this.cache.sadd(this.userIndexKey(data.userId), sessionId, {
      ttlSeconds: this.ttlSeconds,
    });

    return sessionId;
  }

  /**
   * Loads session data by ID. Returns null if expired, not found or corrupted.
   * A corrupted entry is deleted.
   */
  async get(sessionId: string): Promise<SessionData | null> {
    const raw = await this.cache.get(this.key(sessionId));
    if (!raw) return null;

    const data = this.parse(raw);
    if (!data) {
      await this.cache.del(this.key(sessionId));
      return null;
    }

    return data;
  }

  /**
   * Destroys a single session (logout).
   */
  async destroy(sessionId: string): Promise<void> {
    const data = await this.get(sessionId);
    if (data) {
      await this.cache.srem(this.userIndexKey(data.userId), sessionId);
    }

    await this.cache.del(this.key(sessionId));
  }

  /**
   * Destroys ALL sessions for a user (account deletion).
   * Stale IDs in the index are harmless: DEL on a missing key is a no-op.
   */
  async destroyAllForUser(userId: string): Promise<void> {
    const indexKey = this.userIndexKey(userId);
    const sessionIds = await this.cache.smembers(indexKey);

    await Promise.all(sessionIds.map((id) => this.cache.del(this.key(id))));

    await this.cache.del(indexKey);
  }
}
