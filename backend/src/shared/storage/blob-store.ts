/**
 * src/shared/storage/blob-store.ts
 *
 * WHY:
 * - Media bytes live outside the database, in a flat namespace keyed by opaque strings.
 * - MediaService depends on this abstraction so tests run against memory and
 *   deployments can move from local disk to an object store without touching the core.
 *
 * RULES:
 * - Keys are produced by MediaService and already validated (no path separators).
 * - No validation of content here; that is the caller's job.
 */

export interface BlobStore {
  put(key: string, bytes: Buffer): Promise<void>;

  /** Returns null when the key does not exist. */
  get(key: string): Promise<Buffer | null>;

  exists(key: string): Promise<boolean>;

  /** No-op when the key does not exist. */
  delete(key: string): Promise<void>;
}
