/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 * - Username lookups are case-insensitive (matches the lower(username) unique index).
 * - Row locks: account deletion takes FOR UPDATE, review writes take FOR SHARE,
 *   always before any movie lock.
 */

import { sql, type Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { Users } from '../../../shared/db/schema.types';

export type UserRow = Selectable<Users>;

export async function selectUserByUsernameSql(
  db: DbExecutor,
  username: string,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('users')
    .selectAll()
    .where(sql<string>`lower(username)`, '=', username.toLowerCase())
    .executeTakeFirst();
}

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: string,
): Promise<UserRow | undefined> {
  return db.selectFrom('users').selectAll().where('id', '=', userId).executeTakeFirst();
}

export type UserLockMode = 'update' | 'share';

export async function selectUserForLockSql(
  db: DbExecutor,
  userId: string,
  mode: UserLockMode,
): Promise<UserRow | undefined> {
  const query = db.selectFrom('users').selectAll().where('id', '=', userId);
  const locked = mode === 'update' ? query.forUpdate() : query.forShare();
  return locked.executeTakeFirst();
}
