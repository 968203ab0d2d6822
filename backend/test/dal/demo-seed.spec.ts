import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Db } from '../../src/shared/db/db';
import { runDemoSeed } from '../../src/shared/db/seed/demo-seed';
import { findMovieByTitle } from '../../src/modules/movies';
import { createTestDb } from '../helpers/test-db';
import { buildTestDeps } from '../helpers/build-test-app';

describe('demo seed', () => {
  let db: Db;

  beforeAll(async () => {
    db = await createTestDb();
  });

  afterAll(async () => {
    await db.destroy();
  });

  it('is idempotent (users, catalog, reviews)', async () => {
    const { userService, movieService, reviewService } = await buildTestDeps({ db });
    const opts = { db, userService, movieService, reviewService, demoPassword: 'Password123' };

    await runDemoSeed(opts);
    await runDemoSeed(opts);

    const users = await db.selectFrom('users').select('username').orderBy('username').execute();
    expect(users.map((u) => u.username)).toEqual(['alice', 'bob', 'charlie']);

    const movies = await db.selectFrom('movies').select('id').execute();
    expect(movies).toHaveLength(10);

    const reviews = await db.selectFrom('reviews').select('id').execute();
    expect(reviews).toHaveLength(3);

    const orbit = await findMovieByTitle(db, 'Orbit of Glass');
    expect(orbit).toBeDefined();
    if (!orbit) return;

    expect(await reviewService.aggregateFor(orbit.id)).toEqual({
      movieId: orbit.id,
      count: 2,
      mean: 4,
    });
  });

  it('seeded users can sign in with the demo password', async () => {
    const { userService } = await buildTestDeps({ db });

    const user = await userService.verify('bob', 'Password123');
    expect(user.username).toBe('bob');
  });
});
