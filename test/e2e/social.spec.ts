import { describe, it, expect } from 'vitest';

import { bearer, buildTestApp, type ErrorResponseBody } from '../helpers/build-test-app';
import { registerToken } from '../helpers/auth-helpers';

type FollowListBody = { username: string; followers?: string[]; following?: string[] };
type RatingBody = { id: number; whoRate: string; rate: number; comment: string | null };
type RatingSummaryBody = { username: string; average: number; count: number; ratings: RatingBody[] };

describe('follow / unfollow', () => {
  it('a volunteer follows another user; both lists update; following twice is a no-op', async () => {
    const { app, close } = await buildTestApp();
    try {
      const alice = await registerToken(app, 'alice', 'VOLUNTEER');
      await registerToken(app, 'org1', 'ORGANIZER');
      const auth = { authorization: bearer(alice) };

      const first = await app.inject({ method: 'POST', url: '/users/org1/follow', headers: auth });
      expect(first.statusCode).toBe(200);
      expect(first.json<{ status: string }>().status).toBe('FOLLOWED');

      const again = await app.inject({ method: 'POST', url: '/users/org1/follow', headers: auth });
      expect(again.json<{ status: string }>().status).toBe('ALREADY_FOLLOWING');

      const followers = await app.inject({ method: 'GET', url: '/users/org1/followers', headers: auth });
      expect(followers.json<FollowListBody>()).toEqual({ username: 'org1', followers: ['alice'] });

      const following = await app.inject({ method: 'GET', url: '/users/alice/following', headers: auth });
      expect(following.json<FollowListBody>()).toEqual({ username: 'alice', following: ['org1'] });

      const unfollow = await app.inject({ method: 'DELETE', url: '/users/org1/follow', headers: auth });
      expect(unfollow.json<{ status: string }>().status).toBe('UNFOLLOWED');

      const unfollowAgain = await app.inject({ method: 'DELETE', url: '/users/org1/follow', headers: auth });
      expect(unfollowAgain.json<{ status: string }>().status).toBe('NOT_FOLLOWING');

      const after = await app.inject({ method: 'GET', url: '/users/org1/followers', headers: auth });
      expect(after.json<FollowListBody>().followers).toEqual([]);
    } finally {
      await close();
    }
  });

  it('organizers cannot follow or unfollow', async () => {
    const { app, close } = await buildTestApp();
    try {
      await registerToken(app, 'alice', 'VOLUNTEER');
      const org = await registerToken(app, 'org1', 'ORGANIZER');

      const res = await app.inject({
        method: 'POST',
        url: '/users/alice/follow',
        headers: { authorization: bearer(org) },
      });
      expect(res.statusCode).toBe(403);
      expect(res.json<ErrorResponseBody>().error.message).toBe('Insufficient role.');

      const undo = await app.inject({
        method: 'DELETE',
        url: '/users/alice/follow',
        headers: { authorization: bearer(org) },
      });
      expect(undo.statusCode).toBe(403);
      expect(undo.json<ErrorResponseBody>().error.message).toBe('Insufficient role.');
    } finally {
      await close();
    }
  });

  it('following yourself -> 400, an unknown user -> 404', async () => {
    const { app, close } = await buildTestApp();
    try {
      const alice = await registerToken(app, 'alice', 'VOLUNTEER');
      const auth = { authorization: bearer(alice) };

      const self = await app.inject({ method: 'POST', url: '/users/alice/follow', headers: auth });
      expect(self.statusCode).toBe(400);
      expect(self.json<ErrorResponseBody>().error.message).toBe('You cannot follow yourself.');

      const ghost = await app.inject({ method: 'POST', url: '/users/ghost/follow', headers: auth });
      expect(ghost.statusCode).toBe(404);
      expect(ghost.json<ErrorResponseBody>().error).toEqual({
        code: 'NOT_FOUND',
        message: 'User not found',
      });
    } finally {
      await close();
    }
  });

  it('requires a token', async () => {
    const { app, close } = await buildTestApp();
    try {
      await registerToken(app, 'org1', 'ORGANIZER');
      const res = await app.inject({ method: 'GET', url: '/users/org1/followers' });
      expect(res.statusCode).toBe(401);
    } finally {
      await close();
    }
  });
});

describe('ratings and profiles', () => {
  it('ratings accumulate and the average is their mean', async () => {
    const { app, close } = await buildTestApp();
    try {
      const alice = await registerToken(app, 'alice', 'VOLUNTEER');
      const bob = await registerToken(app, 'bob', 'VOLUNTEER');
      await registerToken(app, 'org1', 'ORGANIZER');

      const r1 = await app.inject({
        method: 'POST',
        url: '/users/org1/ratings',
        headers: { authorization: bearer(alice) },
        payload: { rate: 5, comment: 'great' },
      });
      expect(r1.statusCode).toBe(201);
      const created = r1.json<RatingBody>();
      expect(created.whoRate).toBe('alice');
      expect(created.rate).toBe(5);
      expect(created.comment).toBe('great');
      expect(created.id).toBeGreaterThanOrEqual(0);
      expect(created.id).toBeLessThanOrEqual(100000);

      const r2 = await app.inject({
        method: 'POST',
        url: '/users/org1/ratings',
        headers: { authorization: bearer(bob) },
        payload: { rate: 2 },
      });
      expect(r2.statusCode).toBe(201);
      expect(r2.json<RatingBody>().comment).toBeNull();

      const summary = await app.inject({
        method: 'GET',
        url: '/users/org1/rating',
        headers: { authorization: bearer(alice) },
      });
      const body = summary.json<RatingSummaryBody>();
      expect(body.username).toBe('org1');
      expect(body.count).toBe(2);
      expect(body.average).toBe(3.5);
      expect(body.ratings.map((r) => r.whoRate)).toEqual(['alice', 'bob']);
    } finally {
      await close();
    }
  });

  it('an unrated user averages 0', async () => {
    const { app, close } = await buildTestApp();
    try {
      const alice = await registerToken(app, 'alice', 'VOLUNTEER');

      const res = await app.inject({
        method: 'GET',
        url: '/users/alice/rating',
        headers: { authorization: bearer(alice) },
      });
      expect(res.json<RatingSummaryBody>()).toEqual({
        username: 'alice',
        average: 0,
        count: 0,
        ratings: [],
      });
    } finally {
      await close();
    }
  });

  it('rejects a score outside 0..5', async () => {
    const { app, close } = await buildTestApp();
    try {
      const alice = await registerToken(app, 'alice', 'VOLUNTEER');
      await registerToken(app, 'org1', 'ORGANIZER');

      const res = await app.inject({
        method: 'POST',
        url: '/users/org1/ratings',
        headers: { authorization: bearer(alice) },
        payload: { rate: 6 },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorResponseBody>().error.code).toBe('VALIDATION_ERROR');
    } finally {
      await close();
    }
  });

  it('GET /users/:username returns the public profile only', async () => {
    const { app, close } = await buildTestApp();
    try {
      const alice = await registerToken(app, 'alice', 'VOLUNTEER');
      await registerToken(app, 'org1', 'ORGANIZER');

      const res = await app.inject({
        method: 'GET',
        url: '/users/org1',
        headers: { authorization: bearer(alice) },
      });
      expect(res.statusCode).toBe(200);
      const profile = res.json<Record<string, unknown>>();
      expect(profile.username).toBe('org1');
      expect(profile.role).toBe('ORGANIZER');
      expect(profile).not.toHaveProperty('passwordHash');
      expect(profile).not.toHaveProperty('salt');
      expect(profile).not.toHaveProperty('token');
    } finally {
      await close();
    }
  });
});
