import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import type { Db } from '../../src/shared/db/db';
import { isUniqueViolation } from '../../src/shared/db/pg-errors';
import { ReviewRepo } from '../../src/modules/reviews/dal/review.repo';
import {
  countReviewsForMovieSql,
  selectMovieIdsReviewedByUserSql,
  selectRatingStatsSql,
  selectReviewIdByMediaRefSql,
  selectReviewListingPageSql,
} from '../../src/modules/reviews/dal/review.query-sql';
import {
  getAggregateRating,
  getReviewListingById,
  reviewListings,
  takeListings,
} from '../../src/modules/reviews/queries/review.queries';
import { recomputeMovieRating } from '../../src/modules/reviews/helpers/recompute-movie-rating';
import { createTestDb, resetTestDb } from '../helpers/test-db';
import { insertMovie, insertUser } from '../helpers/fixtures';

const noText = { title: null, body: null, mediaRef: null };

describe('reviews DAL', () => {
  let db: Db;
  let repo: ReviewRepo;

  beforeAll(async () => {
    db = await createTestDb();
    repo = new ReviewRepo(db);
  });

  beforeEach(async () => {
    await resetTestDb(db);
  });

  afterAll(async () => {
    await db.destroy();
  });

  it('enforces one review per (user, movie)', async () => {
    const user = await insertUser(db, 'alice');
    const movie = await insertMovie(db, 'Orbit of Glass');

    await repo.insertReview({ userId: user.id, movieId: movie.id, rating: 4, ...noText });

    let caught: unknown = null;
    try {
      await repo.insertReview({ userId: user.id, movieId: movie.id, rating: 2, ...noText });
    } catch (err) {
      caught = err;
    }

    expect(isUniqueViolation(caught)).toBe(true);
  });

  it('updateReview keeps id, seq and created_at', async () => {
    const user = await insertUser(db, 'alice');
    const movie = await insertMovie(db, 'Orbit of Glass');

    const first = await repo.insertReview({ userId: user.id, movieId: movie.id, rating: 4, ...noText });
    const second = await repo.updateReview(first.id, {
      rating: 2,
      title: 'Changed my mind',
      body: null,
      mediaRef: null,
    });

    expect(second.id).toBe(first.id);
    expect(second.seq).toBe(first.seq);
    expect(second.created_at).toEqual(first.created_at);
    expect(second.rating).toBe(2);
    expect(second.title).toBe('Changed my mind');
  });

  it('selectRatingStatsSql scans count and sum; zero for an unreviewed movie', async () => {
    const alice = await insertUser(db, 'alice');
    const bob = await insertUser(db, 'bob');
    const movie = await insertMovie(db, 'Orbit of Glass');
    const empty = await insertMovie(db, 'Nobody Watched');

    await repo.insertReview({ userId: alice.id, movieId: movie.id, rating: 5, ...noText });
    await repo.insertReview({ userId: bob.id, movieId: movie.id, rating: 2, ...noText });

    expect(await selectRatingStatsSql(db, movie.id)).toEqual({ reviewCount: 2, ratingSum: 7 });
    expect(await selectRatingStatsSql(db, empty.id)).toEqual({ reviewCount: 0, ratingSum: 0 });
    expect(await countReviewsForMovieSql(db, movie.id)).toBe(2);
  });

  it('recomputeMovieRating overwrites the stored aggregate', async () => {
    const alice = await insertUser(db, 'alice');
    const movie = await insertMovie(db, 'Orbit of Glass');

    expect(await getAggregateRating(db, movie.id)).toEqual({
      movieId: movie.id,
      count: 0,
      mean: null,
    });

    const review = await repo.insertReview({ userId: alice.id, movieId: movie.id, rating: 3, ...noText });
    expect(await recomputeMovieRating(db, repo, movie.id)).toEqual({
      movieId: movie.id,
      count: 1,
      mean: 3,
    });

    await repo.deleteReview(review.id);
    await recomputeMovieRating(db, repo, movie.id);

    expect(await getAggregateRating(db, movie.id)).toEqual({
      movieId: movie.id,
      count: 0,
      mean: null,
    });
  });

  it('listing rows carry username and movie title', async () => {
    const alice = await insertUser(db, 'alice');
    const movie = await insertMovie(db, 'Orbit of Glass');
    const row = await repo.insertReview({
      userId: alice.id,
      movieId: movie.id,
      rating: 5,
      title: 'Gorgeous',
      body: 'Every frame.',
      mediaRef: null,
    });

    const listing = await getReviewListingById(db, row.id);
    expect(listing).toMatchObject({
      id: row.id,
      userId: alice.id,
      movieId: movie.id,
      rating: 5,
      title: 'Gorgeous',
      body: 'Every frame.',
      username: 'alice',
      movieTitle: 'Orbit of Glass',
    });
  });

  it('pages newest first with a seq cursor and optional movie filter', async () => {
    const users = await Promise.all(['u1', 'u2', 'u3'].map((name) => insertUser(db, name)));
    const movieA = await insertMovie(db, 'A');
    const movieB = await insertMovie(db, 'B');

    // Insertion order: u1/A, u1/B, u2/A, u3/A
    await repo.insertReview({ userId: users[0].id, movieId: movieA.id, rating: 1, ...noText });
    await repo.insertReview({ userId: users[0].id, movieId: movieB.id, rating: 2, ...noText });
    await repo.insertReview({ userId: users[1].id, movieId: movieA.id, rating: 3, ...noText });
    await repo.insertReview({ userId: users[2].id, movieId: movieA.id, rating: 4, ...noText });

    const firstPage = await selectReviewListingPageSql(db, {
      movieId: movieA.id,
      beforeSeq: null,
      limit: 2,
    });
    expect(firstPage.map((r) => r.rating)).toEqual([4, 3]);

    const secondPage = await selectReviewListingPageSql(db, {
      movieId: movieA.id,
      beforeSeq: firstPage[1].seq,
      limit: 2,
    });
    expect(secondPage.map((r) => r.rating)).toEqual([1]);

    const all = await selectReviewListingPageSql(db, { movieId: null, beforeSeq: null, limit: 10 });
    expect(all.map((r) => r.rating)).toEqual([4, 3, 2, 1]);
  });

  it('reviewListings walks every page and restarts on each iteration', async () => {
    const movie = await insertMovie(db, 'A');
    for (let i = 1; i <= 5; i++) {
      const user = await insertUser(db, `user${i}`);
      await repo.insertReview({ userId: user.id, movieId: movie.id, rating: i, ...noText });
    }

    const listings = reviewListings(db, { movieId: movie.id, pageSize: 2 });

    const ratings: number[] = [];
    for await (const listing of listings) ratings.push(listing.rating);
    expect(ratings).toEqual([5, 4, 3, 2, 1]);

    const again = await takeListings(listings, 3);
    expect(again.map((l) => l.username)).toEqual(['user5', 'user4', 'user3']);
  });

  it('reviewListings ends on an empty page', async () => {
    const movie = await insertMovie(db, 'A');
    const user = await insertUser(db, 'alice');
    await repo.insertReview({ userId: user.id, movieId: movie.id, rating: 3, ...noText });

    expect(await takeListings(reviewListings(db, { movieId: null, pageSize: 0 }), 5)).toEqual([]);
  });

  it('takeListings returns nothing for a non-positive limit', async () => {
    const movie = await insertMovie(db, 'A');
    const user = await insertUser(db, 'alice');
    await repo.insertReview({ userId: user.id, movieId: movie.id, rating: 3, ...noText });

    expect(await takeListings(reviewListings(db, { movieId: null, pageSize: 10 }), 0)).toEqual([]);
  });

  it('media_ref is unique across reviews and resolvable to its review', async () => {
    const alice = await insertUser(db, 'alice');
    const bob = await insertUser(db, 'bob');
    const movie = await insertMovie(db, 'A');
    const ref = '123e4567-e89b-12d3-a456-426614174000.png';

    const row = await repo.insertReview({
      userId: alice.id,
      movieId: movie.id,
      rating: 3,
      title: null,
      body: null,
      mediaRef: ref,
    });
    expect(await selectReviewIdByMediaRefSql(db, ref)).toBe(row.id);

    let caught: unknown = null;
    try {
      await repo.insertReview({
        userId: bob.id,
        movieId: movie.id,
        rating: 3,
        title: null,
        body: null,
        mediaRef: ref,
      });
    } catch (err) {
      caught = err;
    }
    expect(isUniqueViolation(caught)).toBe(true);
  });

  it('bulk deletes return the removed rows with their media', async () => {
    const alice = await insertUser(db, 'alice');
    const bob = await insertUser(db, 'bob');
    const movieA = await insertMovie(db, 'A');
    const movieB = await insertMovie(db, 'B');
    const ref = '123e4567-e89b-12d3-a456-426614174000.gif';

    await repo.insertReview({ userId: alice.id, movieId: movieA.id, rating: 3, title: null, body: null, mediaRef: ref });
    await repo.insertReview({ userId: alice.id, movieId: movieB.id, rating: 4, ...noText });
    await repo.insertReview({ userId: bob.id, movieId: movieA.id, rating: 5, ...noText });

    expect((await selectMovieIdsReviewedByUserSql(db, alice.id)).sort()).toEqual(
      [movieA.id, movieB.id].sort(),
    );

    const removedByUser = await repo.deleteReviewsByUser(alice.id);
    expect(removedByUser).toHaveLength(2);
    expect(removedByUser.find((r) => r.movieId === movieA.id)?.mediaRef).toBe(ref);

    const removedByMovie = await repo.deleteReviewsByMovie(movieA.id);
    expect(removedByMovie).toHaveLength(1);
    expect(removedByMovie[0].mediaRef).toBeNull();

    expect(await countReviewsForMovieSql(db, movieA.id)).toBe(0);
  });
});
