import { describe, it, expect } from 'vitest';

import { InMemDocumentStore } from '../../../../src/shared/store/inmem-document-store';
import type { DocumentMutator } from '../../../../src/shared/store/document-store';
import { StorageError } from '../../../../src/shared/store/store.errors';
import { AppError } from '../../../../src/shared/http/errors';
import { logger } from '../../../../src/shared/logger/logger';
import { createDirectoryModule } from '../../../../src/modules/directory/directory.module';
import { SocialService, RATING_ID_MAX } from '../../../../src/modules/social/social.service';
import { createTestUsers } from '../../../helpers/test-deps';

/** Fails update() for the listed paths, as a full disk or a permissions problem would. */
class FailingStore extends InMemDocumentStore {
  readonly failOn = new Set<string>();

  override update<R>(docPath: string, mutate: DocumentMutator<R>): Promise<R> {
    if (this.failOn.has(docPath)) {
      return Promise.reject(new StorageError('save', docPath));
    }
    return super.update(docPath, mutate);
  }
}

const PROFILE = { name: 'Test', surname: 'User' };

async function setup() {
  const store = new FailingStore();
  const { directory } = createDirectoryModule({ store, logger, mode: 'scan' });
  const users = createTestUsers(store);

  await users.account('VOLUNTEER', 'alice').create('test-password', PROFILE);
  await users.account('VOLUNTEER', 'bob').create('test-password', PROFILE);
  await users.account('ORGANIZER', 'org1').create('test-password', PROFILE);

  const social = new SocialService({ directory, userRepo: users.userRepo, logger });
  return { store, social };
}

async function listOf(store: InMemDocumentStore, path: string, field: string): Promise<unknown> {
  const doc = await store.load(path);
  return doc[field];
}

describe('SocialService.follow', () => {
  it('writes both sides', async () => {
    const { store, social } = await setup();

    expect(await social.follow({ follower: 'alice', followee: 'org1' })).toEqual({ status: 'FOLLOWED' });

    expect(await listOf(store, 'Volunteer/alice/user_data.json', 'following')).toEqual(['org1']);
    expect(await listOf(store, 'Organizer/org1/user_data.json', 'followers')).toEqual(['alice']);
  });

  it('volunteers may follow volunteers', async () => {
    const { social } = await setup();

    await social.follow({ follower: 'alice', followee: 'bob' });
    expect(await social.getFollowers('bob')).toEqual(['alice']);
  });

  it('is idempotent', async () => {
    const { store, social } = await setup();

    await social.follow({ follower: 'alice', followee: 'org1' });
    expect(await social.follow({ follower: 'alice', followee: 'org1' })).toEqual({
      status: 'ALREADY_FOLLOWING',
    });
    expect(await listOf(store, 'Organizer/org1/user_data.json', 'followers')).toEqual(['alice']);
  });

  it('repairs a half-written pair', async () => {
    const { store, social } = await setup();
    // followee side missing, e.g. after a crash between the two writes
    await store.update('Volunteer/alice/user_data.json', (doc) => {
      doc.following = ['org1'];
      return { write: true, value: undefined };
    });

    expect(await social.follow({ follower: 'alice', followee: 'org1' })).toEqual({ status: 'FOLLOWED' });
    expect(await listOf(store, 'Organizer/org1/user_data.json', 'followers')).toEqual(['alice']);
  });

  it('rejects organizers, self-follows and unknown users', async () => {
    const { social } = await setup();

    await expect(social.follow({ follower: 'org1', followee: 'alice' })).rejects.toThrowError(
      'Organizers cannot follow other users.',
    );
    await expect(social.follow({ follower: 'alice', followee: 'alice' })).rejects.toThrowError(
      'You cannot follow yourself.',
    );

    const err = await social.follow({ follower: 'alice', followee: 'ghost' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AppError);
    if (err instanceof AppError) {
      expect(err.status).toBe(404);
      expect(err.message).toBe('User not found');
    }
  });

  it('undoes the follower side when the followee write fails', async () => {
    const { store, social } = await setup();
    store.failOn.add('Organizer/org1/user_data.json');

    await expect(social.follow({ follower: 'alice', followee: 'org1' })).rejects.toBeInstanceOf(
      StorageError,
    );

    expect(await listOf(store, 'Volunteer/alice/user_data.json', 'following')).toEqual([]);
    expect(await listOf(store, 'Organizer/org1/user_data.json', 'followers')).toEqual([]);
  });
});

describe('SocialService.unfollow', () => {
  it('removes both sides; a second call is a no-op', async () => {
    const { store, social } = await setup();
    await social.follow({ follower: 'alice', followee: 'org1' });

    expect(await social.unfollow({ follower: 'alice', followee: 'org1' })).toEqual({
      status: 'UNFOLLOWED',
    });
    expect(await social.unfollow({ follower: 'alice', followee: 'org1' })).toEqual({
      status: 'NOT_FOLLOWING',
    });

    expect(await listOf(store, 'Volunteer/alice/user_data.json', 'following')).toEqual([]);
    expect(await listOf(store, 'Organizer/org1/user_data.json', 'followers')).toEqual([]);
  });

  it('restores the follower side when the followee write fails', async () => {
    const { store, social } = await setup();
    await social.follow({ follower: 'alice', followee: 'org1' });
    store.failOn.add('Organizer/org1/user_data.json');

    await expect(social.unfollow({ follower: 'alice', followee: 'org1' })).rejects.toBeInstanceOf(
      StorageError,
    );

    expect(await listOf(store, 'Volunteer/alice/user_data.json', 'following')).toEqual(['org1']);
  });
});

describe('SocialService ratings', () => {
  it('appends ratings and averages them', async () => {
    const { store, social } = await setup();

    const first = await social.rate({ rater: 'alice', ratee: 'org1', score: 4, comment: 'kind' });
    expect(first.whoRate).toBe('alice');
    expect(first.rate).toBe(4);
    expect(first.comment).toBe('kind');
    expect(Number.isInteger(first.id)).toBe(true);
    expect(first.id).toBeGreaterThanOrEqual(0);
    expect(first.id).toBeLessThanOrEqual(RATING_ID_MAX);

    await social.rate({ rater: 'bob', ratee: 'org1', score: 1 });

    expect(await social.averageRating('org1')).toBe(2.5);

    const summary = await social.getRatings('org1');
    expect(summary.count).toBe(2);
    expect(summary.ratings[1]?.comment).toBeNull();

    const doc = await store.load('Organizer/org1/user_data.json');
    expect(doc.rating).toEqual([
      { id: first.id, who_rate: 'alice', rate: 4, comment: 'kind' },
      { id: summary.ratings[1]?.id, who_rate: 'bob', rate: 1, comment: null },
    ]);
  });

  it('[3, 5] averages 4', async () => {
    const { social } = await setup();
    await social.rate({ rater: 'alice', ratee: 'bob', score: 3 });
    await social.rate({ rater: 'org1', ratee: 'bob', score: 5 });

    expect(await social.averageRating('bob')).toBe(4);
  });

  it('averages 0 with no ratings', async () => {
    const { social } = await setup();
    expect(await social.averageRating('bob')).toBe(0);
  });

  it('rating an unknown user is a 404', async () => {
    const { social } = await setup();
    await expect(social.rate({ rater: 'alice', ratee: 'ghost', score: 3 })).rejects.toThrowError(
      'User not found',
    );
  });
});

describe('SocialService.getProfile', () => {
  it('returns the public view', async () => {
    const { social } = await setup();

    const profile = await social.getProfile('org1');
    expect(profile.username).toBe('org1');
    expect(profile.role).toBe('ORGANIZER');
    expect(profile).not.toHaveProperty('salt');
  });
});
