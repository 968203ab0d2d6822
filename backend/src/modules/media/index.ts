/**
 * backend/src/modules/media/index.ts
 *
 * Public surface of the media module.
 */

export type { MediaService } from './media.service';
export type { MediaReference } from './media.types';
