/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  selectUserByIdSql,
  selectUserByUsernameSql,
  selectUserForLockSql,
} from '../dal/user.query-sql';
import type { UserLockMode, UserRow } from '../dal/user.query-sql';
import type { User, UserWithPasswordHash } from '../user.types';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    createdAt: row.created_at,
  };
}

export async function getUserById(db: DbExecutor, userId: string): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return toUser(row);
}

/**
 * Reads the user and row-locks it for the rest of the transaction.
 * 'update' excludes concurrent review writes for that user; 'share' lets them run side by side.
 */
export async function lockUser(
  db: DbExecutor,
  userId: string,
  mode: UserLockMode,
): Promise<User | undefined> {
  const row = await selectUserForLockSql(db, userId, mode);
  if (!row) return undefined;
  return toUser(row);
}

export async function getUserByUsername(
  db: DbExecutor,
  username: string,
): Promise<User | undefined> {
  const row = await selectUserByUsernameSql(db, username);
  if (!row) return undefined;
  return toUser(row);
}

/** Internal to the users module: the only read that carries the hash. */
export async function getUserWithPasswordHash(
  db: DbExecutor,
  username: string,
): Promise<UserWithPasswordHash | undefined> {
  const row = await selectUserByUsernameSql(db, username);
  if (!row) return undefined;
  return { ...toUser(row), passwordHash: row.password_hash };
}
