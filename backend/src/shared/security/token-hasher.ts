/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Usernames end up in rate-limit keys and log lines. We key those by a
 *   one-way digest so the cache and logs never hold the raw identifier.
 */

export interface TokenHasher {
  hash(raw: string): string;
}
