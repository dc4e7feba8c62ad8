import { describe, it, expect } from 'vitest';

import { InMemDocumentStore } from '../../../../src/shared/store/inmem-document-store';
import type { DocumentMutator } from '../../../../src/shared/store/document-store';
import { StorageError } from '../../../../src/shared/store/store.errors';
import { logger } from '../../../../src/shared/logger/logger';
import { EventRepo } from '../../../../src/modules/events/dal/event.repo';
import { EventService } from '../../../../src/modules/events/event.service';
import type { NewEventInput } from '../../../../src/modules/events/event.types';
import { createTestUsers, fixedNow } from '../../../helpers/test-deps';

/** Lets the first `allowed` updates of events.json through, then fails them. */
class FlakyEventsStore extends InMemDocumentStore {
  allowed = Number.POSITIVE_INFINITY;

  override update<R>(docPath: string, mutate: DocumentMutator<R>): Promise<R> {
    if (docPath === 'events.json') {
      if (this.allowed <= 0) return Promise.reject(new StorageError('save', docPath));
      this.allowed -= 1;
    }
    return super.update(docPath, mutate);
  }
}

const EVENT: NewEventInput = {
  title: 'Charity run',
  description: '5k',
  date: '2024-09-01',
  location: 'Park',
};

async function setup() {
  const store = new FlakyEventsStore();
  const users = createTestUsers(store);
  await users.account('ORGANIZER', 'org1').create('test-password', { name: 'O', surname: 'One' });

  const service = new EventService({
    eventRepo: new EventRepo(store, logger),
    userRepo: users.userRepo,
    logger,
    now: fixedNow,
  });
  return { store, service };
}

describe('EventService', () => {
  it('create() stores the event and links it to the creator', async () => {
    const { store, service } = await setup();

    const event = await service.create({ creator: 'org1', creatorRole: 'ORGANIZER', input: EVENT });
    expect(event).toEqual({
      id: event.id,
      ...EVENT,
      createdAt: '2024-06-01T12:00:00.000Z',
      whoCreated: 'org1',
      status: 'active',
      participants: [],
      comments: [],
    });

    const account = await store.load('Organizer/org1/user_data.json');
    expect(account.events).toEqual([event.id]);
  });

  it('create() for a missing creator fails and leaves the event soft-deleted', async () => {
    const { service } = await setup();

    await expect(
      service.create({ creator: 'ghost', creatorRole: 'VOLUNTEER', input: EVENT }),
    ).rejects.toThrowError('User not found');

    const events = await service.list();
    expect(events).toHaveLength(1);
    expect(events[0]?.status).toBe('deleted');
  });

  it('create() keeps the link error when the soft delete also fails', async () => {
    const { store, service } = await setup();
    store.allowed = 1;

    await expect(
      service.create({ creator: 'ghost', creatorRole: 'VOLUNTEER', input: EVENT }),
    ).rejects.toThrowError('User not found');

    store.allowed = Number.POSITIVE_INFINITY;
    const events = await service.list();
    expect(events).toHaveLength(1);
    expect(events[0]?.status).toBe('active');
  });

  it('list() filters by status and creator', async () => {
    const { service } = await setup();
    const a = await service.create({ creator: 'org1', creatorRole: 'ORGANIZER', input: EVENT });
    await service.create({ creator: 'org1', creatorRole: 'ORGANIZER', input: { ...EVENT, title: 'B' } });
    await service.softDelete({ id: a.id, actor: 'org1' });

    expect((await service.list()).map((e) => e.title)).toEqual(['Charity run', 'B']);
    expect((await service.list({ status: 'active' })).map((e) => e.title)).toEqual(['B']);
    expect(await service.list({ creator: 'someone-else' })).toEqual([]);
  });

  it('update() applies only the patched fields', async () => {
    const { service } = await setup();
    const event = await service.create({ creator: 'org1', creatorRole: 'ORGANIZER', input: EVENT });

    const updated = await service.update({ id: event.id, actor: 'org1', patch: { location: null } });
    expect(updated.location).toBeNull();
    expect(updated.title).toBe('Charity run');
    expect(updated.createdAt).toBe(event.createdAt);

    await expect(
      service.update({ id: event.id, actor: 'alice', patch: { title: 'x' } }),
    ).rejects.toThrowError('Only the creator can modify this event.');
  });

  it('participants and comments', async () => {
    const { service } = await setup();
    const event = await service.create({ creator: 'org1', creatorRole: 'ORGANIZER', input: EVENT });

    expect(await service.addParticipant({ id: event.id, username: 'alice' })).toBe(true);
    expect(await service.addParticipant({ id: event.id, username: 'alice' })).toBe(false);
    expect(await service.addParticipant({ id: 'nope', username: 'alice' })).toBe(false);

    expect(await service.addComment({ id: event.id, author: 'alice', text: 'hi' })).toBe(true);
    expect(await service.addComment({ id: 'nope', author: 'alice', text: 'hi' })).toBe(false);

    const stored = await service.get(event.id);
    expect(stored.participants).toEqual(['alice']);
    expect(stored.comments).toEqual([
      { author: 'alice', text: 'hi', timestamp: '2024-06-01T12:00:00.000Z' },
    ]);
  });

  it('get() of an unknown id is a 404', async () => {
    const { service } = await setup();
    await expect(service.get('missing')).rejects.toThrowError('Event not found');
  });
});
