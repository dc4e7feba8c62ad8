/**
 * src/shared/security/token.ts
 *
 * WHY:
 * - Token generation should be consistent and strong across the system.
 * - Bearer tokens carry a short prefix so the issuing partition is visible at a glance
 *   (e.g. "vol_9f2c...", "org_41ab...").
 *
 * HOW TO USE:
 * - const token = generatePrefixedToken('vol')   // 'vol_' + 32 hex chars
 * - const prefix = tokenPrefix(token)            // 'vol'
 * - tokensEqual(stored, presented)               // constant-time compare
 *
 * RULES:
 * - At least 16 random bytes (128 bits). Possession of the token IS authentication.
 */

import { randomBytes, timingSafeEqual } from 'node:crypto';

export const MIN_TOKEN_BYTES = 16;

const PREFIX_PATTERN = /^[a-z]{3}$/;

export function generatePrefixedToken(prefix: string, bytes: number = MIN_TOKEN_BYTES): string {
  if (!PREFIX_PATTERN.test(prefix)) {
    throw new Error(`generatePrefixedToken: prefix must be 3 lowercase letters. Got "${prefix}".`);
  }
  if (bytes < MIN_TOKEN_BYTES) {
    throw new Error(`generatePrefixedToken: need at least ${MIN_TOKEN_BYTES} bytes. Got ${bytes}.`);
  }

  return `${prefix}_${randomBytes(bytes).toString('hex')}`;
}

/** Returns the 3-letter prefix of a well-formed token, or null. */
export function tokenPrefix(token: string): string | null {
  const match = /^([a-z]{3})_[0-9a-f]+$/.exec(token);
  return match ? (match[1] ?? null) : null;
}

/** Constant-time comparison for bearer tokens of equal length. */
export function tokensEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}
