import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import type { Db } from '../../src/shared/db/db';
import type { MediaService } from '../../src/modules/media';
import type { MovieService } from '../../src/modules/movies';
import type { ReviewService } from '../../src/modules/reviews';
import type { UserService } from '../../src/modules/users';
import type { SessionStore } from '../../src/shared/session/session.store';
import { takeListings } from '../../src/modules/reviews/queries/review.queries';
import { createTestDb, resetTestDb } from '../helpers/test-db';
import { buildTestDeps } from '../helpers/build-test-app';
import { PNG_BYTES, TEST_PASSWORD } from '../helpers/fixtures';

describe('accounts', () => {
  let db: Db;
  let users: UserService;
  let movies: MovieService;
  let reviews: ReviewService;
  let media: MediaService;
  let sessions: SessionStore;

  beforeAll(async () => {
    db = await createTestDb();
    const built = await buildTestDeps({ db });
    users = built.userService;
    movies = built.movieService;
    reviews = built.reviewService;
    media = built.mediaService;
    sessions = built.deps.sessionStore;
  });

  beforeEach(async () => {
    await resetTestDb(db);
  });

  afterAll(async () => {
    await db.destroy();
  });

  it('register then verify; usernames are unique ignoring case', async () => {
    const alice = await users.register('Alice', TEST_PASSWORD);
    expect(alice.username).toBe('Alice');

    const verified = await users.verify('alice', TEST_PASSWORD);
    expect(verified.id).toBe(alice.id);

    await expect(users.register('ALICE', TEST_PASSWORD)).rejects.toMatchObject({
      code: 'CONFLICT',
    });
  });

  it('verify gives the same error for a wrong password and an unknown user', async () => {
    await users.register('alice', TEST_PASSWORD);

    await expect(users.verify('alice', 'Wrong-password1')).rejects.toMatchObject({
      code: 'UNAUTHORIZED',
      message: 'Invalid username or password.',
    });
    await expect(users.verify('nobody', TEST_PASSWORD)).rejects.toMatchObject({
      code: 'UNAUTHORIZED',
      message: 'Invalid username or password.',
    });
  });

  it('register rejects weak passwords before touching the database', async () => {
    await expect(users.register('alice', 'short')).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
    });
    expect(await db.selectFrom('users').select('id').execute()).toEqual([]);
  });

  it('login creates a session that logout destroys', async () => {
    await users.register('alice', TEST_PASSWORD);

    const { user, sessionId } = await users.login({
      username: 'alice',
      password: TEST_PASSWORD,
      ip: '127.0.0.1',
      requestId: 'req-test',
    });

    expect(await sessions.get(sessionId)).toMatchObject({ userId: user.id, username: 'alice' });

    await users.logout(sessionId);
    expect(await sessions.get(sessionId)).toBeNull();
  });

  it('deleteAccount removes reviews, recomputes aggregates, ends sessions and frees media', async () => {
    const alice = await users.register('alice', TEST_PASSWORD);
    const bob = await users.register('bob', TEST_PASSWORD);
    const movie = await movies.addMovie('Orbit of Glass');
    const ref = await media.put(PNG_BYTES, 'image/png');

    await reviews.submit({ userId: alice.id, movieId: movie.id, rating: 5, mediaRef: ref });
    await reviews.submit({ userId: bob.id, movieId: movie.id, rating: 3 });

    const { sessionId } = await users.login({
      username: 'alice',
      password: TEST_PASSWORD,
      ip: '127.0.0.1',
      requestId: 'req-test',
    });

    await users.deleteAccount(alice.id);

    await expect(users.getUser(alice.id)).rejects.toMatchObject({ code: 'NOT_FOUND' });
    expect(await sessions.get(sessionId)).toBeNull();
    expect(await media.exists(ref)).toBe(false);
    expect(await reviews.aggregateFor(movie.id)).toEqual({ movieId: movie.id, count: 1, mean: 3 });

    const listed = await takeListings(await reviews.listForMovie(movie.id), 10);
    expect(listed.map((r) => r.username)).toEqual(['bob']);

    // The name is free again.
    const again = await users.register('alice', TEST_PASSWORD);
    expect(again.id).not.toBe(alice.id);
  });

  it('a submit racing account deletion never outlives the account', async () => {
    const alice = await users.register('alice', TEST_PASSWORD);
    const seen = await movies.addMovie('Orbit of Glass');
    const fresh = await movies.addMovie('Paper Boats');
    await reviews.submit({ userId: alice.id, movieId: seen.id, rating: 5 });

    const [deleted, submitted] = await Promise.allSettled([
      users.deleteAccount(alice.id),
      reviews.submit({ userId: alice.id, movieId: fresh.id, rating: 2 }),
    ]);

    expect(deleted.status).toBe('fulfilled');
    if (submitted.status === 'rejected') {
      expect(submitted.reason).toMatchObject({ code: 'NOT_FOUND', message: 'User not found.' });
    }

    expect(await reviews.aggregateFor(seen.id)).toEqual({ movieId: seen.id, count: 0, mean: null });
    expect(await reviews.aggregateFor(fresh.id)).toEqual({
      movieId: fresh.id,
      count: 0,
      mean: null,
    });
  });

  it('deleteAccount of an unknown user is not found', async () => {
    await expect(
      users.deleteAccount('123e4567-e89b-12d3-a456-426614174000'),
    ).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });
});
