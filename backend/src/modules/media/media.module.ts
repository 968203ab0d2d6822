/**
 * src/modules/media/media.module.ts
 *
 * WHY:
 * - Encapsulates Media module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes the BlobStore in).
 */

import type { FastifyInstance } from 'fastify';
import type { BlobStore } from '../../shared/storage/blob-store';
import type { Logger } from '../../shared/logger/logger';

import { MediaService } from './media.service';
import { MediaController } from './media.controller';
import { registerMediaRoutes } from './media.routes';

export type MediaModule = ReturnType<typeof createMediaModule>;

export function createMediaModule(deps: { blobStore: BlobStore; logger: Logger; maxBytes: number }) {
  const mediaService = new MediaService(deps);
  const controller = new MediaController(mediaService);

  return {
    mediaService,
    registerRoutes(app: FastifyInstance) {
      registerMediaRoutes(app, controller, { maxBytes: deps.maxBytes });
    },
  };
}
