/**
 * src/modules/social/policies/follow.policy.ts
 *
 * WHY:
 * - Follow eligibility rules in one place.
 * - Pure logic (no I/O) => easy to unit test.
 *
 * RULES:
 * - Pure functions only.
 * - Throws module-level errors.
 */

import type { DirectoryEntry } from '../../directory/directory.types';
import { UserErrors } from '../../users/user.errors';
import { SocialErrors } from '../social.errors';

export function assertUserExists(
  entry: DirectoryEntry | undefined,
  username: string,
): asserts entry is DirectoryEntry {
  if (!entry) throw UserErrors.userNotFound({ username });
}

export function assertCanFollow(follower: DirectoryEntry, followee: DirectoryEntry): void {
  if (follower.role !== 'VOLUNTEER') {
    throw SocialErrors.organizerCannotFollow({ username: follower.user.username });
  }
  if (follower.user.username === followee.user.username) {
    throw SocialErrors.cannotFollowSelf({ username: follower.user.username });
  }
}
