/**
 * backend/src/modules/users/user.constants.ts
 *
 * WHY:
 * - Credential rules and login throttling, single-sourced.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

export const USERNAME_RULES = {
  minLength: 3,
  maxLength: 32,
  pattern: /^[A-Za-z0-9_.-]+$/,
} as const;

// bcrypt only looks at the first 72 bytes; longer passwords would be silently truncated.
export const PASSWORD_RULES = {
  minLength: 8,
  maxLength: 72,
} as const;

export const USER_RATE_LIMITS = {
  login: {
    perUsername: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 20, windowSeconds: 900 },
  },
} as const;
