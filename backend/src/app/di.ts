/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis, blob store) and shares them safely.
 * - Tests inject in-process infra through `overrides`.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves (DIP).
 * - close() only closes infra this file created; injected infra belongs to the caller.
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import type { BlobStore } from '../shared/storage/blob-store';
import { FsBlobStore } from '../shared/storage/fs-blob-store';

import { RateLimiter } from '../shared/security/rate-limit';
import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { SessionStore } from '../shared/session/session.store';

import { createMediaModule } from '../modules/media/media.module';
import type { MediaModule } from '../modules/media/media.module';

import { createReviewModule } from '../modules/reviews/review.module';
import type { ReviewModule } from '../modules/reviews/review.module';

import { createMovieModule } from '../modules/movies/movie.module';
import type { MovieModule } from '../modules/movies/movie.module';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

export type InfraOverrides = {
  db?: Db;
  cache?: Cache;
  blobStore?: BlobStore;
  passwordHasher?: PasswordHasher;
};

export type AppDeps = {
  db: Db;
  cache: Cache;
  blobStore: BlobStore;

  logger: Logger;

  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;

  sessionStore: SessionStore;

  // modules
  media: MediaModule;
  reviews: ReviewModule;
  movies: MovieModule;
  users: UserModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function buildDeps(
  config: AppConfig,
  overrides: InfraOverrides = {},
): Promise<AppDeps> {
  const closers: Array<() => Promise<void>> = [];

  let db: Db;
  if (overrides.db) {
    db = overrides.db;
  } else {
    const created = createDb(config.databaseUrl);
    closers.push(() => created.destroy());
    db = created;
  }

  let cache: Cache;
  if (overrides.cache) {
    cache = overrides.cache;
  } else {
    const redis = await RedisCache.connect(config.redisUrl);
    closers.push(() => redis.close());
    cache = redis;
  }

  const blobStore = overrides.blobStore ?? (await FsBlobStore.open(config.media.dir));

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher =
    overrides.passwordHasher ?? new BcryptPasswordHasher({ cost: config.bcryptCost });

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  const sessionStore = new SessionStore(cache, config.sessionTtlSeconds, logger);

  // modules (no HTTP / no business logic here)
  const media = createMediaModule({ blobStore, logger, maxBytes: config.media.maxBytes });

  const reviews = createReviewModule({ db, logger, mediaService: media.mediaService });

  const movies = createMovieModule({
    db,
    logger,
    reviewService: reviews.reviewService,
    mediaService: media.mediaService,
  });

  const users = createUserModule({
    db,
    logger,
    passwordHasher,
    tokenHasher,
    rateLimiter,
    sessionStore,
    reviewService: reviews.reviewService,
    mediaService: media.mediaService,
    sessionCookie: {
      secure: config.nodeEnv === 'production',
      maxAgeSeconds: config.sessionTtlSeconds,
    },
  });

  return {
    db,
    cache,
    blobStore,
    logger,
    rateLimiter,
    tokenHasher,
    passwordHasher,
    sessionStore,
    media,
    reviews,
    movies,
    users,
    close: async () => {
      for (const close of closers.reverse()) {
        await close();
      }
    },
  };
}
