/**
 * src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP → UserService for the /auth endpoints.
 * - Sets / clears the session cookie.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Cookie logic lives in shared/session/set-session-cookie (DRY).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { parseRequest } from '../../shared/http/parse-request';
import { requireSession } from '../../shared/http/require-auth-context';
import { clearSessionCookie, setSessionCookie } from '../../shared/session/set-session-cookie';
import type { SessionCookieOptions } from '../../shared/session/set-session-cookie';
import type { UserService } from './user.service';
import { loginSchema, registerSchema } from './user.schemas';

export class UserController {
  constructor(
    private readonly userService: UserService,
    private readonly cookie: SessionCookieOptions,
  ) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const body = parseRequest(registerSchema, req.body);

    const user = await this.userService.register(body.username, body.password, {
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send({ user });
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const body = parseRequest(loginSchema, req.body);

    const { user, sessionId } = await this.userService.login({
      username: body.username,
      password: body.password,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    setSessionCookie(reply, sessionId, this.cookie);
    return reply.status(200).send({ user });
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    await this.userService.logout(session.sessionId, {
      requestId: req.requestContext.requestId,
    });

    clearSessionCookie(reply, this.cookie);
    return reply.status(204).send();
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const user = await this.userService.getUser(session.userId);
    return reply.status(200).send({ user, isAdmin: session.isAdmin });
  }

  async deleteMe(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    await this.userService.deleteAccount(session.userId, {
      requestId: req.requestContext.requestId,
    });

    clearSessionCookie(reply, this.cookie);
    return reply.status(204).send();
  }
}
