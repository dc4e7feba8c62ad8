/**
 * src/shared/security/salt.ts
 *
 * Per-account salt: 16 random bytes, hex-encoded (32 chars).
 * Generated at account creation and again on every password change.
 */

import { randomBytes } from 'node:crypto';

export const SALT_BYTES = 16;

export function generateSalt(): string {
  return randomBytes(SALT_BYTES).toString('hex');
}
