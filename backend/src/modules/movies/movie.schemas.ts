/**
 * src/modules/movies/movie.schemas.ts
 *
 * WHY:
 * - Request shape validation for catalog endpoints.
 */

import { z } from 'zod';

export const addMovieSchema = z.object({
  title: z.string(),
  releaseYear: z.number().nullish(),
  genre: z.string().nullish(),
});

export type AddMovieInput = z.infer<typeof addMovieSchema>;

export const movieParamsSchema = z.object({
  movieId: z.string().min(1),
});

// Query strings arrive as text; only an explicit "true"/"1" enables cascade.
export const removeMovieQuerySchema = z.object({
  cascade: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((v) => v === 'true' || v === '1'),
});
