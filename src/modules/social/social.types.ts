/**
 * src/modules/social/social.types.ts
 */

import type { Rating } from '../users/user.types';

export type FollowResult = { status: 'FOLLOWED' | 'ALREADY_FOLLOWING' };
export type UnfollowResult = { status: 'UNFOLLOWED' | 'NOT_FOLLOWING' };

export type RatingSummary = {
  username: string;
  average: number;
  count: number;
  ratings: Rating[];
};

/** Arithmetic mean of the scores; 0 when there are none. */
export function averageOf(ratings: readonly Rating[]): number {
  if (ratings.length === 0) return 0;
  const total = ratings.reduce((sum, r) => sum + r.rate, 0);
  return total / ratings.length;
}
