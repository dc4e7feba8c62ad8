/**
 * src/modules/social/social.service.ts
 *
 * WHY:
 * - Operations that touch MORE THAN ONE account document (follow/unfollow),
 *   plus ratings and the public profile view.
 *
 * RULES:
 * - Accounts are resolved through the directory (role is not known up front).
 * - Each document write is one locked update via UserRepo. Two documents are NOT
 *   written atomically: when the second write fails, the first is undone
 *   (compensation) and the original failure is rethrown.
 * - A failed compensation is logged at error level; the original error still wins.
 * - Idempotent: following twice (or unfollowing a stranger) writes nothing.
 */

import { randomInt } from 'node:crypto';

import type { Logger } from '../../shared/logger/logger';
import type { DirectoryIndex, DirectoryEntry } from '../directory/directory.types';
import type {
  ListAddResult,
  ListRemoveResult,
  UserListField,
  UserRepo,
} from '../users/dal/user.repo';
import { UserErrors } from '../users/user.errors';
import { toUserProfile, type Rating, type UserProfile } from '../users/user.types';

import { assertCanFollow, assertUserExists } from './policies/follow.policy';
import {
  averageOf,
  type FollowResult,
  type RatingSummary,
  type UnfollowResult,
} from './social.types';

/** Rating ids are random in [0, RATING_ID_MAX]; uniqueness is not guaranteed. */
export const RATING_ID_MAX = 100000;

export class SocialService {
  constructor(
    private readonly deps: {
      directory: DirectoryIndex;
      userRepo: UserRepo;
      logger: Logger;
    },
  ) {}

  private async resolve(username: string): Promise<DirectoryEntry> {
    const entry = await this.deps.directory.findByUsername(username);
    assertUserExists(entry, username);
    return entry;
  }

  private async compensate(params: {
    entry: DirectoryEntry;
    field: UserListField;
    value: string;
    undo: 'add' | 'remove';
    flow: string;
  }): Promise<void> {
    const target = { role: params.entry.role, username: params.entry.user.username };
    try {
      if (params.undo === 'remove') {
        await this.deps.userRepo.removeFromList({ ...target, field: params.field, value: params.value });
      } else {
        await this.deps.userRepo.addToList({ ...target, field: params.field, value: params.value });
      }
    } catch (err) {
      this.deps.logger.error({
        msg: 'social.compensation_failed',
        flow: params.flow,
        username: target.username,
        field: params.field,
        err,
      });
    }
  }

  async follow(params: { follower: string; followee: string }): Promise<FollowResult> {
    const follower = await this.resolve(params.follower);
    const followee = await this.resolve(params.followee);
    assertCanFollow(follower, followee);

    const followerName = follower.user.username;
    const followeeName = followee.user.username;

    const first = await this.deps.userRepo.addToList({
      role: follower.role,
      username: followerName,
      field: 'following',
      value: followeeName,
    });
    if (first === 'missing') throw UserErrors.userNotFound({ username: followerName });

    const undoFirst = async () => {
      if (first !== 'added') return;
      await this.compensate({
        entry: follower,
        field: 'following',
        value: followeeName,
        undo: 'remove',
        flow: 'social.follow',
      });
    };

    let second: ListAddResult;
    try {
      second = await this.deps.userRepo.addToList({
        role: followee.role,
        username: followeeName,
        field: 'followers',
        value: followerName,
      });
    } catch (err) {
      this.deps.logger.error({
        msg: 'social.follow.second_write_failed',
        flow: 'social.follow',
        follower: followerName,
        followee: followeeName,
        err,
      });
      await undoFirst();
      throw err;
    }

    if (second === 'missing') {
      await undoFirst();
      throw UserErrors.userNotFound({ username: followeeName });
    }

    const changed = first === 'added' || second === 'added';
    this.deps.logger.info({
      msg: changed ? 'social.follow.created' : 'social.follow.noop',
      flow: 'social.follow',
      follower: followerName,
      followee: followeeName,
    });

    return { status: changed ? 'FOLLOWED' : 'ALREADY_FOLLOWING' };
  }

  async unfollow(params: { follower: string; followee: string }): Promise<UnfollowResult> {
    const follower = await this.resolve(params.follower);
    const followee = await this.resolve(params.followee);

    const followerName = follower.user.username;
    const followeeName = followee.user.username;

    const first = await this.deps.userRepo.removeFromList({
      role: follower.role,
      username: followerName,
      field: 'following',
      value: followeeName,
    });
    if (first === 'missing') throw UserErrors.userNotFound({ username: followerName });

    const undoFirst = async () => {
      if (first !== 'removed') return;
      await this.compensate({
        entry: follower,
        field: 'following',
        value: followeeName,
        undo: 'add',
        flow: 'social.unfollow',
      });
    };

    let second: ListRemoveResult;
    try {
      second = await this.deps.userRepo.removeFromList({
        role: followee.role,
        username: followeeName,
        field: 'followers',
        value: followerName,
      });
    } catch (err) {
      this.deps.logger.error({
        msg: 'social.unfollow.second_write_failed',
        flow: 'social.unfollow',
        follower: followerName,
        followee: followeeName,
        err,
      });
      await undoFirst();
      throw err;
    }

    if (second === 'missing') {
      await undoFirst();
      throw UserErrors.userNotFound({ username: followeeName });
    }

    const changed = first === 'removed' || second === 'removed';
    this.deps.logger.info({
      msg: changed ? 'social.unfollow.removed' : 'social.unfollow.noop',
      flow: 'social.unfollow',
      follower: followerName,
      followee: followeeName,
    });

    return { status: changed ? 'UNFOLLOWED' : 'NOT_FOLLOWING' };
  }

  async getFollowers(username: string): Promise<string[]> {
    const entry = await this.resolve(username);
    return entry.user.followers;
  }

  async getFollowing(username: string): Promise<string[]> {
    const entry = await this.resolve(username);
    return entry.user.following;
  }

  async getProfile(username: string): Promise<UserProfile> {
    const entry = await this.resolve(username);
    return toUserProfile(entry.user);
  }

  /** Score range is enforced by the HTTP schema, not here. */
  async rate(params: {
    rater: string;
    ratee: string;
    score: number;
    comment?: string | null;
  }): Promise<Rating> {
    const ratee = await this.resolve(params.ratee);

    const rating: Rating = {
      id: randomInt(0, RATING_ID_MAX + 1),
      whoRate: params.rater,
      rate: params.score,
      comment: params.comment ?? null,
    };

    const saved = await this.deps.userRepo.appendRating({
      role: ratee.role,
      username: ratee.user.username,
      rating,
    });
    if (!saved) throw UserErrors.userNotFound({ username: params.ratee });

    this.deps.logger.info({
      msg: 'social.rating.added',
      flow: 'social.rate',
      rater: params.rater,
      ratee: ratee.user.username,
      rate: params.score,
    });

    return rating;
  }

  async averageRating(username: string): Promise<number> {
    const entry = await this.resolve(username);
    return averageOf(entry.user.ratings);
  }

  async getRatings(username: string): Promise<RatingSummary> {
    const entry = await this.resolve(username);
    return {
      username: entry.user.username,
      average: averageOf(entry.user.ratings),
      count: entry.user.ratings.length,
      ratings: entry.user.ratings,
    };
  }
}
