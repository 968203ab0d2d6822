/**
 * src/modules/movies/movie.controller.ts
 *
 * WHY:
 * - Maps HTTP → MovieService.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Removal is admin-only; the admin check is requireSession's, not the service's.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { parseRequest } from '../../shared/http/parse-request';
import { requireSession } from '../../shared/http/require-auth-context';
import type { MovieService } from './movie.service';
import { addMovieSchema, movieParamsSchema, removeMovieQuerySchema } from './movie.schemas';

export class MovieController {
  constructor(private readonly movieService: MovieService) {}

  async list(_req: FastifyRequest, reply: FastifyReply) {
    const movies = await this.movieService.listMovies();
    return reply.status(200).send({ movies });
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const { movieId } = parseRequest(movieParamsSchema, req.params, 'Invalid movie id');

    const movie = await this.movieService.getMovie(movieId);
    return reply.status(200).send(movie);
  }

  async add(req: FastifyRequest, reply: FastifyReply) {
    requireSession(req);
    const body = parseRequest(addMovieSchema, req.body);

    const movie = await this.movieService.addMovie(
      body.title,
      { releaseYear: body.releaseYear, genre: body.genre },
      { requestId: req.requestContext.requestId },
    );

    return reply.status(201).send(movie);
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    requireSession(req, { admin: true });
    const { movieId } = parseRequest(movieParamsSchema, req.params, 'Invalid movie id');
    const { cascade } = parseRequest(removeMovieQuerySchema, req.query, 'Invalid query string');

    await this.movieService.removeMovie(
      movieId,
      { cascade },
      { requestId: req.requestContext.requestId },
    );

    return reply.status(204).send();
  }
}
