/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /queries or /dal.
 *
 * RULES:
 * - Only export stable, read-only contracts needed by other modules.
 * - The password-hash query is NOT exported.
 */

export { getUserById, getUserByUsername, lockUser } from './queries/user.queries';
export type { UserService } from './user.service';
export type { User, UserId } from './user.types';
