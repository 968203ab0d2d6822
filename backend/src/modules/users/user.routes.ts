/**
 * src/modules/users/user.routes.ts
 *
 * WHY:
 * - Declares account endpoints.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { UserController } from './user.controller';

export function registerUserRoutes(app: FastifyInstance, controller: UserController) {
  app.post('/auth/register', controller.register.bind(controller));
  app.post('/auth/login', controller.login.bind(controller));
  app.post('/auth/logout', controller.logout.bind(controller));

  app.get('/auth/me', controller.me.bind(controller));
  app.delete('/auth/me', controller.deleteMe.bind(controller));
}
