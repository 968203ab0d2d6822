/**
 * backend/src/modules/media/media.constants.ts
 *
 * RULES:
 * - Content type <-> file extension is a bijection; the extension inside a
 *   reference is how `get` recovers the content type.
 */

export const MEDIA_CONTENT_TYPES = {
  'image/png': 'png',
  'image/jpeg': 'jpeg',
  'image/gif': 'gif',
} as const;

export const MEDIA_REF_PATTERN =
  /^([0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12})\.(png|jpeg|gif)$/;

/** Leading bytes each accepted format must start with. */
export const MEDIA_SIGNATURES: Record<keyof typeof MEDIA_CONTENT_TYPES, readonly number[][]> = {
  'image/png': [[0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]],
  'image/jpeg': [[0xff, 0xd8, 0xff]],
  'image/gif': [
    [0x47, 0x49, 0x46, 0x38, 0x37, 0x61], // GIF87a
    [0x47, 0x49, 0x46, 0x38, 0x39, 0x61], // GIF89a
  ],
};
