/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Response types for register/login.
 *
 * RULES:
 * - The bearer token is returned ONLY by register and login.
 * - Never include passwords, hashes or salts.
 */

import type { UserRole } from '../users/user.types';

export type AuthResult = {
  status: 'AUTHENTICATED';
  username: string;
  role: UserRole;
  token: string;
};

export type BasicCredentials = {
  username: string;
  password: string;
};
