/**
 * src/shared/storage/inmem-blob-store.ts
 *
 * In-memory BlobStore for tests. Stores copies so callers cannot mutate stored bytes.
 */

import type { BlobStore } from './blob-store';

export class InMemBlobStore implements BlobStore {
  private readonly blobs = new Map<string, Buffer>();

  put(key: string, bytes: Buffer): Promise<void> {
    this.blobs.set(key, Buffer.from(bytes));
    return Promise.resolve();
  }

  get(key: string): Promise<Buffer | null> {
    const bytes = this.blobs.get(key);
    return Promise.resolve(bytes ? Buffer.from(bytes) : null);
  }

  exists(key: string): Promise<boolean> {
    return Promise.resolve(this.blobs.has(key));
  }

  delete(key: string): Promise<void> {
    this.blobs.delete(key);
    return Promise.resolve();
  }

  get size(): number {
    return this.blobs.size;
  }
}
