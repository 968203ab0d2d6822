/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Bcrypt embeds a per-hash salt and compares in constant time.
 * - Encapsulated behind PasswordHasher so the rest of the app stays clean.
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: config.bcryptCost })
 * - Tests pass cost 4 (bcrypt's minimum); config never allows below 10.
 *
 * NOTE:
 * - bcrypt reads only the first 72 bytes. PASSWORD_RULES caps passwords there, so
 *   two passwords never collide on a shared prefix.
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

export class BcryptPasswordHasher implements PasswordHasher {
  constructor(private readonly opts: { cost: number }) {}

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.opts.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }
}
