/**
 * backend/src/modules/media/media.errors.ts
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const MediaErrors = {
  invalidUpload(reason: string, meta?: AppErrorMeta) {
    return AppError.validationError(reason, meta);
  },

  invalidReference(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid media reference.', meta);
  },

  mediaNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Media not found.', meta);
  },
} as const;
