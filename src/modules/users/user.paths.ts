/**
 * src/modules/users/user.paths.ts
 *
 * Deterministic document locations: <Role>/<username>/user_data.json, with the
 * role directory capitalised ("Volunteer", "Organizer").
 */

import { joinDocumentPath } from '../../shared/store/document-store';
import { tokenPrefix } from '../../shared/security/token';
import { USER_ROLES, type UserRole } from './user.types';

export const USER_DOCUMENT_FILE = 'user_data.json';

// Letters, digits, '_', '.', '-'. No '/' and no leading dot, so a username can't leave its directory.
export const USERNAME_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]{2,63}$/;

const PARTITIONS: Record<UserRole, string> = {
  VOLUNTEER: 'Volunteer',
  ORGANIZER: 'Organizer',
};

const TOKEN_PREFIXES: Record<UserRole, string> = {
  VOLUNTEER: 'vol',
  ORGANIZER: 'org',
};

export function isValidUsername(username: string): boolean {
  return USERNAME_PATTERN.test(username);
}

export function rolePartition(role: UserRole): string {
  return PARTITIONS[role];
}

export function roleFromPartition(partition: string): UserRole | undefined {
  return USER_ROLES.find((role) => PARTITIONS[role].toLowerCase() === partition.toLowerCase());
}

export function userDocumentPath(role: UserRole, username: string): string {
  return joinDocumentPath(rolePartition(role), username, USER_DOCUMENT_FILE);
}

/**
 * Reverse of userDocumentPath(). Returns undefined for anything that is not
 * <Partition>/<username>/user_data.json.
 */
export function parseUserDocumentPath(
  docPath: string,
): { role: UserRole; username: string } | undefined {
  const [partition, username, file, ...rest] = docPath.split('/');
  if (!partition || !username || file !== USER_DOCUMENT_FILE || rest.length > 0) return undefined;

  const role = roleFromPartition(partition);
  return role ? { role, username } : undefined;
}

export function tokenPrefixForRole(role: UserRole): string {
  return TOKEN_PREFIXES[role];
}

export function roleFromTokenPrefix(prefix: string | null): UserRole | undefined {
  if (!prefix) return undefined;
  return USER_ROLES.find((role) => TOKEN_PREFIXES[role] === prefix);
}

/** Role a bearer token claims through its prefix; undefined for unknown or malformed tokens. */
export function roleForToken(token: string): UserRole | undefined {
  return roleFromTokenPrefix(tokenPrefix(token));
}
