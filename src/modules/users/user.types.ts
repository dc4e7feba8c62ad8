/**
 * src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - A user is one account document, partitioned on disk by role.
 *
 * RULES:
 * - Keep aligned with the on-disk document (dal/user.document.ts maps both ways).
 * - Avoid leaking document naming (snake_case) outside the DAL.
 * - UserProfile is the public view: never carries hash, salt or token.
 */

export const USER_ROLES = ['VOLUNTEER', 'ORGANIZER'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export type Rating = {
  id: number;
  whoRate: string;
  rate: number;
  comment: string | null;
};

export type User = {
  username: string;
  role: UserRole;
  name: string;
  surname: string;
  email: string | null;

  passwordHash: string;
  salt: string;
  token: string;

  avatar: string;
  skills: string[];
  specializations: string[];
  events: string[];
  ratings: Rating[];
  followers: string[];
  following: string[];
};

export type UserProfile = Omit<User, 'passwordHash' | 'salt' | 'token'>;

/** Fields supplied at registration (password travels separately). */
export type NewUserProfile = {
  name: string;
  surname: string;
  email?: string | null;
  skills?: string[];
  specializations?: string[];
};

/**
 * The only mutable profile fields. Anything else (role, username, credentials,
 * relationship lists) changes through its own operation.
 */
export type ProfilePatch = {
  name?: string;
  surname?: string;
  email?: string | null;
  avatar?: string;
  skills?: string[];
  specializations?: string[];
};

export function toUserProfile(user: User): UserProfile {
  const { passwordHash: _hash, salt: _salt, token: _token, ...profile } = user;
  return profile;
}
