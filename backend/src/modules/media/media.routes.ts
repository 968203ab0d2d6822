/**
 * src/modules/media/media.routes.ts
 *
 * WHY:
 * - Declares Media endpoints and the raw-image body parser they need.
 *
 * RULES:
 * - No business logic here.
 * - bodyLimit mirrors MEDIA_MAX_BYTES so oversized uploads stop at the socket (413).
 */

import type { FastifyInstance } from 'fastify';
import { MEDIA_CONTENT_TYPES } from './media.constants';
import type { MediaController } from './media.controller';

export function registerMediaRoutes(
  app: FastifyInstance,
  controller: MediaController,
  opts: { maxBytes: number },
) {
  app.addContentTypeParser(
    Object.keys(MEDIA_CONTENT_TYPES),
    { parseAs: 'buffer', bodyLimit: opts.maxBytes },
    (_req, body, done) => {
      done(null, body);
    },
  );

  app.post('/media', { bodyLimit: opts.maxBytes }, controller.upload.bind(controller));
  app.get('/media/:ref', controller.get.bind(controller));
}
