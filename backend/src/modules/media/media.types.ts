/**
 * backend/src/modules/media/media.types.ts
 *
 * WHY:
 * - Domain types for the Media Store.
 * - A MediaReference is opaque outside this module: `<uuid>.<ext>`.
 */

import type { MEDIA_CONTENT_TYPES } from './media.constants';

export type MediaReference = string;

export type MediaContentType = keyof typeof MEDIA_CONTENT_TYPES;

export type StoredMedia = {
  ref: MediaReference;
  bytes: Buffer;
  contentType: MediaContentType;
};
