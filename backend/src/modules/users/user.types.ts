/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Credential Store.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - The password hash never leaves the users module (UserWithPasswordHash is internal).
 */

export type UserId = string;

export type User = {
  id: UserId;
  username: string;
  createdAt: Date;
};

export type UserWithPasswordHash = User & {
  passwordHash: string;
};

export type LoginParams = {
  username: string;
  password: string;
  ip: string;
  requestId: string;
};

export type LoginResult = {
  user: User;
  sessionId: string;
};
