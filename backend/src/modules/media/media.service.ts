/**
 * backend/src/modules/media/media.service.ts
 *
 * WHY:
 * - Media Store: validated image bytes under opaque references.
 * - Reviews link media by reference; the bytes are written first
 *   (write-then-link), so a crash between the two leaves an orphan blob, never
 *   a review pointing at nothing.
 *
 * RULES:
 * - References are generated here, never accepted from callers on write.
 * - delete/release are best-effort. Orphaned blobs are acceptable; a failed
 *   release is logged, not thrown, because the owning transaction already committed.
 */

import { randomUUID } from 'node:crypto';

import type { BlobStore } from '../../shared/storage/blob-store';
import type { LogContext, Logger } from '../../shared/logger/logger';
import { MEDIA_CONTENT_TYPES } from './media.constants';
import { MediaErrors } from './media.errors';
import type { MediaReference, StoredMedia } from './media.types';
import {
  getUploadFailure,
  isAllowedContentType,
  normalizeContentType,
  parseMediaRef,
} from './policies/media-upload.policy';

export class MediaService {
  constructor(
    private readonly deps: {
      blobStore: BlobStore;
      logger: Logger;
      maxBytes: number;
    },
  ) {}

  async put(bytes: Buffer, contentType: string, ctx: LogContext = {}): Promise<MediaReference> {
    const normalized = normalizeContentType(contentType);

    const failure = getUploadFailure({ bytes, contentType: normalized, maxBytes: this.deps.maxBytes });
    if (failure || !isAllowedContentType(normalized)) {
      throw MediaErrors.invalidUpload(failure ?? 'Unsupported media type.', {
        contentType: normalized,
        size: bytes.length,
      });
    }

    const ref = `${randomUUID()}.${MEDIA_CONTENT_TYPES[normalized]}`;
    await this.deps.blobStore.put(ref, bytes);

    this.deps.logger.info('media.put.success', {
      flow: 'media.put',
      requestId: ctx.requestId,
      ref,
      contentType: normalized,
      size: bytes.length,
    });

    return ref;
  }

  async get(ref: MediaReference): Promise<StoredMedia> {
    const parsed = parseMediaRef(ref);
    if (!parsed) throw MediaErrors.invalidReference({ ref });

    const bytes = await this.deps.blobStore.get(ref);
    if (!bytes) throw MediaErrors.mediaNotFound({ ref });

    return { ref, bytes, contentType: parsed.contentType };
  }

  /** A malformed reference does not exist. */
  async exists(ref: MediaReference): Promise<boolean> {
    if (!parseMediaRef(ref)) return false;
    return this.deps.blobStore.exists(ref);
  }

  async delete(ref: MediaReference): Promise<void> {
    if (!parseMediaRef(ref)) return;
    await this.deps.blobStore.delete(ref);
  }

  /**
   * Post-commit cleanup for media no longer linked from any review.
   * Never throws.
   */
  async release(refs: readonly MediaReference[], ctx: LogContext & { flow: string }): Promise<void> {
    const results = await Promise.allSettled(refs.map((ref) => this.delete(ref)));

    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        this.deps.logger.warn('media.release.failed', {
          flow: ctx.flow,
          requestId: ctx.requestId,
          ref: refs[i],
          err: result.reason,
        });
      }
    });
  }
}
