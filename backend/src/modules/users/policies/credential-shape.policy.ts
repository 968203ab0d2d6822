/**
 * backend/src/modules/users/policies/credential-shape.policy.ts
 *
 * WHY:
 * - Username and password rules for registration, as pure functions.
 *
 * RULES:
 * - Pure: no DB, no hashing, no logging.
 * - get*Failure returns a human-readable reason or null; assert* throws.
 */

import { PASSWORD_RULES, USERNAME_RULES } from '../user.constants';
import { UserErrors } from '../user.errors';

export function normalizeUsername(raw: string): string {
  return raw.trim();
}

export function getUsernameFailure(username: string): string | null {
  if (username.length < USERNAME_RULES.minLength || username.length > USERNAME_RULES.maxLength) {
    return `Username must be ${USERNAME_RULES.minLength}-${USERNAME_RULES.maxLength} characters.`;
  }

  if (!USERNAME_RULES.pattern.test(username)) {
    return 'Username may only contain letters, digits, dots, dashes and underscores.';
  }

  return null;
}

export function getPasswordFailure(password: string): string | null {
  if (password.length < PASSWORD_RULES.minLength) {
    return `Password must be at least ${PASSWORD_RULES.minLength} characters.`;
  }

  if (Buffer.byteLength(password, 'utf8') > PASSWORD_RULES.maxLength) {
    return `Password must be at most ${PASSWORD_RULES.maxLength} bytes.`;
  }

  if (!/[A-Z]/.test(password)) {
    return 'Password must contain at least one uppercase letter.';
  }

  if (!/[0-9]/.test(password)) {
    return 'Password must contain at least one digit.';
  }

  return null;
}

export function assertValidCredentials(input: { username: string; password: string }): void {
  const usernameFailure = getUsernameFailure(input.username);
  if (usernameFailure) throw UserErrors.invalidUsername(usernameFailure, { field: 'username' });

  const passwordFailure = getPasswordFailure(input.password);
  if (passwordFailure) throw UserErrors.weakPassword(passwordFailure, { field: 'password' });
}
