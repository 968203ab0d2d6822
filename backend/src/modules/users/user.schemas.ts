/**
 * src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Request shape validation for the auth endpoints.
 *
 * RULES:
 * - Shape only (strings present). Credential rules live in
 *   policies/credential-shape.policy.ts so the service enforces them for
 *   every caller, not only HTTP.
 */

import { z } from 'zod';

export const registerSchema = z.object({
  username: z.string().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
});

export type RegisterInput = z.infer<typeof registerSchema>;

export const loginSchema = z.object({
  username: z.string().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
});

export type LoginInput = z.infer<typeof loginSchema>;
