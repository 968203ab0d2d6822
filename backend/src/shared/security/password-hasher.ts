/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - The credential store keeps only a salted hash, never the plaintext.
 * - Services depend on an interface (DIP), not bcrypt directly.
 *
 * HOW TO USE:
 * - const hash = await hasher.hash(password)
 * - const ok = await hasher.verify(password, hash)
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
