import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { Db } from '../../src/shared/db/db';
import type { InMemBlobStore } from '../../src/shared/storage/inmem-blob-store';
import { buildTestApp } from '../helpers/build-test-app';
import { createTestDb, resetTestDb } from '../helpers/test-db';
import { GIF_BYTES, insertMovie, PNG_BYTES } from '../helpers/fixtures';
import { signUpAndLogin, type SignedInUser } from '../helpers/http-session';

describe('/media', () => {
  let db: Db;
  let app: FastifyInstance;
  let blobStore: InMemBlobStore;
  let close: () => Promise<void>;

  beforeAll(async () => {
    db = await createTestDb();
    ({ app, blobStore, close } = await buildTestApp({ db }));
  });

  beforeEach(async () => {
    await resetTestDb(db);
  });

  afterAll(async () => {
    await close();
    await db.destroy();
  });

  function upload(user: SignedInUser | null, bytes: Buffer, contentType: string) {
    return app.inject({
      method: 'POST',
      url: '/media',
      headers: {
        'content-type': contentType,
        ...(user ? { cookie: user.cookie } : {}),
      },
      payload: bytes,
    });
  }

  it('uploads and serves an image unchanged', async () => {
    const alice = await signUpAndLogin(app, 'alice');

    const res = await upload(alice, GIF_BYTES, 'image/gif');
    expect(res.statusCode).toBe(201);

    const { ref } = res.json<{ ref: string }>();
    expect(ref).toMatch(/\.gif$/);

    const served = await app.inject({ method: 'GET', url: `/media/${ref}` });
    expect(served.statusCode).toBe(200);
    expect(served.headers['content-type']).toBe('image/gif');
    expect(served.rawPayload.equals(GIF_BYTES)).toBe(true);
  });

  it('uploading requires a session', async () => {
    const before = blobStore.size;
    const res = await upload(null, PNG_BYTES, 'image/png');

    expect(res.statusCode).toBe(401);
    expect(blobStore.size).toBe(before);
  });

  it('rejects mismatched, unsupported and oversized uploads', async () => {
    const alice = await signUpAndLogin(app, 'alice');

    const mismatched = await upload(alice, PNG_BYTES, 'image/gif');
    expect(mismatched.statusCode).toBe(400);
    expect(mismatched.json()).toEqual({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Upload content does not match its declared image type.',
      },
    });

    const unsupported = await upload(alice, Buffer.from('hello'), 'application/octet-stream');
    expect(unsupported.statusCode).toBe(415);

    const oversized = await upload(alice, Buffer.alloc(64 * 1024 + 1, 0x89), 'image/png');
    expect(oversized.statusCode).toBe(413);
    expect(oversized.json()).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });
  });

  it('400 for a malformed reference, 404 for an unknown one', async () => {
    const malformed = await app.inject({ method: 'GET', url: '/media/not-a-ref' });
    expect(malformed.statusCode).toBe(400);

    const missing = await app.inject({
      method: 'GET',
      url: '/media/123e4567-e89b-12d3-a456-426614174000.png',
    });
    expect(missing.statusCode).toBe(404);
  });

  it('an attached image is deleted with its review', async () => {
    const alice = await signUpAndLogin(app, 'alice');
    const movie = await insertMovie(db, 'Orbit of Glass');
    const { ref } = (await upload(alice, PNG_BYTES, 'image/png')).json<{ ref: string }>();

    const submitted = await app.inject({
      method: 'POST',
      url: `/movies/${movie.id}/reviews`,
      headers: { cookie: alice.cookie },
      payload: { rating: 5, mediaRef: ref },
    });
    expect(submitted.statusCode).toBe(201);
    const reviewId = submitted.json<{ review: { id: string } }>().review.id;

    await app.inject({
      method: 'DELETE',
      url: `/reviews/${reviewId}`,
      headers: { cookie: alice.cookie },
    });

    const served = await app.inject({ method: 'GET', url: `/media/${ref}` });
    expect(served.statusCode).toBe(404);
  });
});
