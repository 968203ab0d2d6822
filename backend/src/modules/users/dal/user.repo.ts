/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  /**
   * Creates a new user. Username must be unique case-insensitively (enforced by DB index).
   * Callers map unique-violation to a conflict.
   */
  async insertUser(params: {
    username: string;
    passwordHash: string;
  }): Promise<{ id: string; username: string; createdAt: Date }> {
    const row = await this.db
      .insertInto('users')
      .values({
        username: params.username,
        password_hash: params.passwordHash,
      })
      .returning(['id', 'username', 'created_at'])
      .executeTakeFirstOrThrow();

    return { id: row.id, username: row.username, createdAt: row.created_at };
  }

  /**
   * Reviews reference users with ON DELETE RESTRICT: callers must cascade through
   * the review ledger first.
   */
  async deleteUser(userId: string): Promise<boolean> {
    const res = await this.db.deleteFrom('users').where('id', '=', userId).executeTakeFirst();
    return res.numDeletedRows > 0n;
  }
}
