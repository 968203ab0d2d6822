import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { Db } from '../../src/shared/db/db';
import { SESSION_COOKIE_NAME } from '../../src/shared/session/session.types';
import { buildTestApp } from '../helpers/build-test-app';
import { createTestDb, resetTestDb } from '../helpers/test-db';
import { readCookie, TEST_PASSWORD } from '../helpers/fixtures';
import { signUpAndLogin } from '../helpers/http-session';

type ErrorResponseBody = {
  error: { code: string; message: string };
};

describe('/auth', () => {
  let db: Db;
  let app: FastifyInstance;
  let close: () => Promise<void>;

  beforeAll(async () => {
    db = await createTestDb();
    ({ app, close } = await buildTestApp({ db }));
  });

  beforeEach(async () => {
    await resetTestDb(db);
  });

  afterAll(async () => {
    await close();
    await db.destroy();
  });

  describe('POST /auth/register', () => {
    it('creates an account without exposing the password hash', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: { username: 'alice', password: TEST_PASSWORD },
      });

      expect(res.statusCode).toBe(201);

      const body: { user: Record<string, unknown> } = res.json();
      expect(Object.keys(body.user).sort()).toEqual(['createdAt', 'id', 'username']);
      expect(body.user.username).toBe('alice');
    });

    it('409 when the username is taken in any casing', async () => {
      await signUpAndLogin(app, 'alice');

      const res = await app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: { username: 'Alice', password: TEST_PASSWORD },
      });

      expect(res.statusCode).toBe(409);
      expect(res.json<ErrorResponseBody>().error.code).toBe('CONFLICT');
    });

    it('400 for a weak password or a missing field', async () => {
      const weak = await app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: { username: 'alice', password: 'password' },
      });
      expect(weak.statusCode).toBe(400);
      expect(weak.json<ErrorResponseBody>().error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Password must contain at least one uppercase letter.',
      });

      const missing = await app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: { username: 'alice' },
      });
      expect(missing.statusCode).toBe(400);
      expect(missing.json<ErrorResponseBody>().error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Invalid request body',
      });
    });
  });

  describe('POST /auth/login', () => {
    it('sets an HttpOnly session cookie', async () => {
      await app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: { username: 'alice', password: TEST_PASSWORD },
      });

      const res = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { username: 'ALICE', password: TEST_PASSWORD },
      });

      expect(res.statusCode).toBe(200);
      expect(readCookie(res.headers['set-cookie'], SESSION_COOKIE_NAME)).not.toBeNull();
      expect(String(res.headers['set-cookie'])).toContain('HttpOnly');
      // Cookie lifetime follows the session TTL (1 hour in tests).
      expect(String(res.headers['set-cookie'])).toContain('Max-Age=3600');
      expect(res.json<{ user: { username: string } }>().user.username).toBe('alice');
    });

    it('401 with one message for bad password and unknown user', async () => {
      await signUpAndLogin(app, 'alice');

      for (const payload of [
        { username: 'alice', password: 'Wrong-pass1' },
        { username: 'nobody', password: TEST_PASSWORD },
      ]) {
        const res = await app.inject({ method: 'POST', url: '/auth/login', payload });

        expect(res.statusCode).toBe(401);
        expect(res.json<ErrorResponseBody>().error).toEqual({
          code: 'UNAUTHORIZED',
          message: 'Invalid username or password.',
        });
        expect(res.headers['set-cookie']).toBeUndefined();
      }
    });
  });

  describe('session lifecycle', () => {
    it('GET /auth/me requires a session', async () => {
      const res = await app.inject({ method: 'GET', url: '/auth/me' });

      expect(res.statusCode).toBe(401);
      expect(res.json<ErrorResponseBody>().error.message).toBe('Authentication required');
    });

    it('GET /auth/me reports the user and admin flag', async () => {
      const alice = await signUpAndLogin(app, 'alice');
      const admin = await signUpAndLogin(app, 'admin');

      const me = await app.inject({ method: 'GET', url: '/auth/me', headers: { cookie: alice.cookie } });
      expect(me.statusCode).toBe(200);
      expect(me.json()).toMatchObject({ user: { id: alice.id, username: 'alice' }, isAdmin: false });

      const adminMe = await app.inject({
        method: 'GET',
        url: '/auth/me',
        headers: { cookie: admin.cookie },
      });
      expect(adminMe.json()).toMatchObject({ isAdmin: true });
    });

    it('logout ends the session and clears the cookie', async () => {
      const alice = await signUpAndLogin(app, 'alice');

      const res = await app.inject({
        method: 'POST',
        url: '/auth/logout',
        headers: { cookie: alice.cookie },
      });
      expect(res.statusCode).toBe(204);
      expect(String(res.headers['set-cookie'])).toContain('Max-Age=0');

      const me = await app.inject({ method: 'GET', url: '/auth/me', headers: { cookie: alice.cookie } });
      expect(me.statusCode).toBe(401);
    });

    it('DELETE /auth/me removes the account; its credentials stop working', async () => {
      const alice = await signUpAndLogin(app, 'alice');

      const res = await app.inject({
        method: 'DELETE',
        url: '/auth/me',
        headers: { cookie: alice.cookie },
      });
      expect(res.statusCode).toBe(204);

      const me = await app.inject({ method: 'GET', url: '/auth/me', headers: { cookie: alice.cookie } });
      expect(me.statusCode).toBe(401);

      const login = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { username: 'alice', password: TEST_PASSWORD },
      });
      expect(login.statusCode).toBe(401);
    });
  });
});
