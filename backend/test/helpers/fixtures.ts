/**
 * test/helpers/fixtures.ts
 *
 * Small builders for test data. Passwords and image bytes are placeholders.
 */

import type { Db } from '../../src/shared/db/db';

export const TEST_PASSWORD = 'Password123';

// Smallest byte prefixes that carry each format's signature.
export const PNG_BYTES = Buffer.from([
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d,
]);
export const JPEG_BYTES = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]);
export const GIF_BYTES = Buffer.from('GIF89a\x01\x00\x01\x00', 'latin1');

export async function insertUser(db: Db, username: string): Promise<{ id: string }> {
  return db
    .insertInto('users')
    .values({ username, password_hash: 'not-a-real-hash' })
    .returning(['id'])
    .executeTakeFirstOrThrow();
}

export async function insertMovie(db: Db, title: string): Promise<{ id: string }> {
  return db
    .insertInto('movies')
    .values({ title, release_year: null, genre: null })
    .returning(['id'])
    .executeTakeFirstOrThrow();
}

export function readCookie(
  setCookie: string | string[] | number | undefined,
  name: string,
): string | null {
  const headers = Array.isArray(setCookie)
    ? setCookie
    : typeof setCookie === 'string'
      ? [setCookie]
      : [];

  for (const header of headers) {
    const first = header.split(';')[0];
    const eq = first.indexOf('=');
    if (eq > 0 && first.slice(0, eq) === name) return first.slice(eq + 1);
  }

  return null;
}
