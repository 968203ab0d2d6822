/**
 * src/modules/media/media.controller.ts
 *
 * WHY:
 * - Maps HTTP → MediaService.
 * - Upload body is the raw image (parsed to a Buffer by the route's content-type parser).
 *
 * RULES:
 * - No storage access here.
 * - No validation rules here beyond "the body is bytes".
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';

import { AppError } from '../../shared/http/errors';
import { parseRequest } from '../../shared/http/parse-request';
import { requireSession } from '../../shared/http/require-auth-context';
import type { MediaService } from './media.service';

const mediaParamsSchema = z.object({
  ref: z.string().min(1),
});

export class MediaController {
  constructor(private readonly mediaService: MediaService) {}

  async upload(req: FastifyRequest, reply: FastifyReply) {
    requireSession(req);

    if (!Buffer.isBuffer(req.body)) {
      throw AppError.validationError('Request body must be a PNG, JPEG or GIF image.');
    }

    const ref = await this.mediaService.put(req.body, req.headers['content-type'] ?? '', {
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send({ ref });
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const { ref } = parseRequest(mediaParamsSchema, req.params, 'Invalid media reference.');

    const media = await this.mediaService.get(ref);

    // References are immutable: a ref always names the same bytes.
    return reply
      .status(200)
      .header('Content-Type', media.contentType)
      .header('Cache-Control', 'public, max-age=31536000, immutable')
      .send(media.bytes);
  }
}
