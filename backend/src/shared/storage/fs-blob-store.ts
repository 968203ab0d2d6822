/**
 * src/shared/storage/fs-blob-store.ts
 *
 * WHY:
 * - Default BlobStore: one file per key under a single directory (the uploads folder).
 *
 * HOW TO USE:
 * - const blobs = await FsBlobStore.open('uploads')
 *
 * RULES:
 * - Writes go to a temp file first and are renamed into place, so a reader never
 *   sees a half-written blob and a key only exists once its bytes are durable.
 */

import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import type { BlobStore } from './blob-store';

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export class FsBlobStore implements BlobStore {
  private constructor(private readonly dir: string) {}

  static async open(dir: string): Promise<FsBlobStore> {
    const absolute = path.resolve(dir);
    await mkdir(absolute, { recursive: true });
    return new FsBlobStore(absolute);
  }

  private pathFor(key: string): string {
    return path.join(this.dir, path.basename(key));
  }

  async put(key: string, bytes: Buffer): Promise<void> {
    const target = this.pathFor(key);
    const tmp = `${target}.${randomUUID()}.tmp`;

    await writeFile(tmp, bytes, { flag: 'wx' });
    await rename(tmp, target);
  }

  async get(key: string): Promise<Buffer | null> {
    try {
      return await readFile(this.pathFor(key));
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      const info = await stat(this.pathFor(key));
      return info.isFile();
    } catch (err) {
      if (isMissingFile(err)) return false;
      throw err;
    }
  }

  async delete(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }
}
