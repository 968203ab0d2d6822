/**
 * backend/src/shared/db/schema.types.ts
 *
 * WHY:
 * - Kysely table interfaces for the CineVibe schema.
 * - Hand-maintained: every migration that changes a table updates this file
 *   in the same commit.
 *
 * RULES:
 * - snake_case, exactly as in Postgres. Domain types live in each module.
 * - Columns with DB defaults are Generated<> (optional on insert).
 */

import type { Generated } from 'kysely';

export interface Users {
  id: Generated<string>;
  username: string;
  password_hash: string;
  created_at: Generated<Date>;
}

export interface Movies {
  id: Generated<string>;
  title: string;
  release_year: number | null;
  genre: string | null;
  created_at: Generated<Date>;
}

export interface Reviews {
  id: Generated<string>;
  /** Identity column: insertion order, used as the listing cursor. */
  seq: Generated<number>;
  user_id: string;
  movie_id: string;
  rating: number;
  title: string | null;
  body: string | null;
  media_ref: string | null;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

/**
 * Derived aggregate per movie. Rewritten from a full count/sum scan of `reviews`
 * on every review mutation; never incremented.
 */
export interface MovieRatings {
  movie_id: string;
  review_count: number;
  rating_sum: number;
  updated_at: Generated<Date>;
}

export interface DB {
  users: Users;
  movies: Movies;
  reviews: Reviews;
  movie_ratings: MovieRatings;
}
