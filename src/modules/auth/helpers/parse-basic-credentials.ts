/**
 * src/modules/auth/helpers/parse-basic-credentials.ts
 *
 * WHY:
 * - Login takes HTTP Basic credentials: `Authorization: Basic base64(username:password)`.
 *
 * RULES:
 * - Pure function; returns null for anything unusable (the controller answers 401).
 * - The password may itself contain ':' (split on the FIRST colon only).
 */

import type { BasicCredentials } from '../auth.types';

export function parseBasicCredentials(header: string | undefined): BasicCredentials | null {
  if (!header) return null;

  const match = /^Basic\s+([A-Za-z0-9+/=]+)$/i.exec(header.trim());
  if (!match?.[1]) return null;

  const decoded = Buffer.from(match[1], 'base64').toString('utf8');
  const sep = decoded.indexOf(':');
  if (sep <= 0) return null;

  const username = decoded.slice(0, sep);
  const password = decoded.slice(sep + 1);
  if (!password) return null;

  return { username, password };
}
