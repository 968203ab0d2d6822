/**
 * backend/src/modules/media/policies/media-upload.policy.ts
 *
 * WHY:
 * - Decides whether a byte payload may be stored, and parses references.
 *
 * RULES:
 * - Pure: no storage, no logging.
 * - The declared content type must be allowed AND the bytes must carry that
 *   format's signature; a .png name on a text file is rejected.
 */

import { MEDIA_CONTENT_TYPES, MEDIA_REF_PATTERN, MEDIA_SIGNATURES } from '../media.constants';
import type { MediaContentType } from '../media.types';

export function isAllowedContentType(value: string): value is MediaContentType {
  return Object.prototype.hasOwnProperty.call(MEDIA_CONTENT_TYPES, value);
}

/** Strips parameters and case from a Content-Type header value. */
export function normalizeContentType(raw: string | undefined): string {
  return (raw ?? '').split(';')[0].trim().toLowerCase();
}

function hasSignature(bytes: Buffer, contentType: MediaContentType): boolean {
  return MEDIA_SIGNATURES[contentType].some(
    (sig) => bytes.length >= sig.length && sig.every((b, i) => bytes[i] === b),
  );
}

export function getUploadFailure(input: {
  bytes: Buffer;
  contentType: string;
  maxBytes: number;
}): string | null {
  if (input.bytes.length === 0) return 'Upload is empty.';

  if (input.bytes.length > input.maxBytes) {
    return `Upload exceeds the ${input.maxBytes} byte limit.`;
  }

  if (!isAllowedContentType(input.contentType)) {
    return 'Only PNG, JPEG and GIF images are accepted.';
  }

  if (!hasSignature(input.bytes, input.contentType)) {
    return 'Upload content does not match its declared image type.';
  }

  return null;
}

export function contentTypeForExtension(ext: string): MediaContentType | null {
  for (const [type, candidate] of Object.entries(MEDIA_CONTENT_TYPES)) {
    if (candidate === ext && isAllowedContentType(type)) return type;
  }
  return null;
}

/** Returns the content type a well-formed reference encodes, or null if malformed. */
export function parseMediaRef(ref: string): { contentType: MediaContentType } | null {
  const match = MEDIA_REF_PATTERN.exec(ref);
  if (!match) return null;

  const contentType = contentTypeForExtension(match[2]);
  return contentType ? { contentType } : null;
}
