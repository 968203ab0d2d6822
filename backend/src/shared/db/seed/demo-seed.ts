/**
 * backend/src/shared/db/seed/demo-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates:
 * - demo users alice, bob, charlie (password from SEED_DEMO_PASSWORD)
 * - a small catalog
 * - a few sample reviews, submitted through the review ledger so the
 *   aggregates are computed the same way as for real traffic
 *
 * Idempotent: safe to run on every start. Existing users and titles are reused;
 * resubmitting a review overwrites it in place.
 */

import type { DbExecutor } from '../db';
import { logger } from '../../logger/logger';
import { getUserByUsername, type UserService } from '../../../modules/users';
import { findMovieByTitle, type MovieService } from '../../../modules/movies';
import type { ReviewService } from '../../../modules/reviews';

const DEMO_USERS = ['alice', 'bob', 'charlie'] as const;

type DemoUser = (typeof DEMO_USERS)[number];

const DEMO_MOVIES: ReadonlyArray<{ title: string; releaseYear: number; genre: string }> = [
  { title: 'The Lighthouse Keeper', releaseYear: 2019, genre: 'Drama' },
  { title: 'Orbit of Glass', releaseYear: 2021, genre: 'Sci-Fi' },
  { title: 'Midnight at the Depot', releaseYear: 1987, genre: 'Thriller' },
  { title: 'Paper Boats', releaseYear: 2008, genre: 'Family' },
  { title: 'The Long Rehearsal', releaseYear: 2015, genre: 'Comedy' },
  { title: 'Salt and Iron', releaseYear: 1962, genre: 'Western' },
  { title: 'Quiet Harbor', releaseYear: 2012, genre: 'Romance' },
  { title: 'Static Bloom', releaseYear: 2023, genre: 'Horror' },
  { title: 'Cartographers', releaseYear: 1999, genre: 'Adventure' },
  { title: 'A Winter Ledger', releaseYear: 2004, genre: 'Mystery' },
];

const DEMO_REVIEWS: ReadonlyArray<{
  username: DemoUser;
  movieTitle: string;
  rating: number;
  title: string;
  body: string;
}> = [
  {
    username: 'alice',
    movieTitle: 'Orbit of Glass',
    rating: 5,
    title: 'Gorgeous',
    body: 'Every frame could hang on a wall.',
  },
  {
    username: 'bob',
    movieTitle: 'Orbit of Glass',
    rating: 3,
    title: 'Pretty but slow',
    body: 'Looks great, drags in the middle act.',
  },
  {
    username: 'charlie',
    movieTitle: 'Midnight at the Depot',
    rating: 4,
    title: 'Tense',
    body: 'Kept me guessing until the last reel.',
  },
];

export async function runDemoSeed(opts: {
  db: DbExecutor;
  userService: UserService;
  movieService: MovieService;
  reviewService: ReviewService;
  demoPassword: string;
}): Promise<void> {
  const flow = 'seed.demo';

  const userIds = new Map<string, string>();
  for (const username of DEMO_USERS) {
    const existing = await getUserByUsername(opts.db, username);
    if (existing) {
      userIds.set(username, existing.id);
      logger.info('seed.user.exists', { flow, username, userId: existing.id });
      continue;
    }

    const created = await opts.userService.register(username, opts.demoPassword);
    userIds.set(username, created.id);
    logger.info('seed.user.created', { flow, username, userId: created.id });
  }

  const movieIds = new Map<string, string>();
  for (const movie of DEMO_MOVIES) {
    const existing = await findMovieByTitle(opts.db, movie.title);
    if (existing) {
      movieIds.set(movie.title, existing.id);
      continue;
    }

    const created = await opts.movieService.addMovie(movie.title, {
      releaseYear: movie.releaseYear,
      genre: movie.genre,
    });
    movieIds.set(movie.title, created.id);
    logger.info('seed.movie.created', { flow, movieId: created.id, title: movie.title });
  }

  for (const review of DEMO_REVIEWS) {
    const userId = userIds.get(review.username);
    const movieId = movieIds.get(review.movieTitle);
    if (!userId || !movieId) {
      throw new Error(`Demo seed references unknown ${review.username} / ${review.movieTitle}`);
    }

    const result = await opts.reviewService.submit({
      userId,
      movieId,
      rating: review.rating,
      title: review.title,
      body: review.body,
    });

    logger.info('seed.review.submitted', {
      flow,
      reviewId: result.review.id,
      created: result.created,
    });
  }
}
