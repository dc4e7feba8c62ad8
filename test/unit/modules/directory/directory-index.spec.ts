import { describe, it, expect } from 'vitest';

import { InMemDocumentStore } from '../../../../src/shared/store/inmem-document-store';
import { logger } from '../../../../src/shared/logger/logger';
import { createDirectoryModule } from '../../../../src/modules/directory/directory.module';
import type { DirectoryIndexMode } from '../../../../src/app/config';
import { MemoryDirectoryIndex } from '../../../../src/modules/directory/memory-directory-index';
import { ScanDirectoryIndex } from '../../../../src/modules/directory/scan-directory-index';
import { createTestUsers } from '../../../helpers/test-deps';

const PROFILE = { name: 'Test', surname: 'User' };

async function setup(mode: DirectoryIndexMode) {
  const store = new InMemDocumentStore();
  const { directory } = createDirectoryModule({ store, logger, mode });
  const users = createTestUsers(store, (user) => directory.record(user));
  return { store, directory, users };
}

describe.each<DirectoryIndexMode>(['scan', 'memory'])('directory index (%s)', (mode) => {
  it('finds accounts by token and by username, in either partition', async () => {
    const { directory, users } = await setup(mode);
    await directory.warm();

    const alice = await users.account('VOLUNTEER', 'alice').create('test-password', PROFILE);
    const org = await users.account('ORGANIZER', 'org1').create('test-password', PROFILE);

    const byToken = await directory.findByToken(org.token);
    expect(byToken?.role).toBe('ORGANIZER');
    expect(byToken?.user.username).toBe('org1');

    const byName = await directory.findByUsername('alice');
    expect(byName?.role).toBe('VOLUNTEER');
    expect(byName?.user.token).toBe(alice.token);
  });

  it('misses return undefined; empty keys never match', async () => {
    const { directory, users } = await setup(mode);
    await users.account('VOLUNTEER', 'alice').create('test-password', PROFILE);

    expect(await directory.findByToken('vol_00000000000000000000000000000000')).toBeUndefined();
    expect(await directory.findByUsername('nobody')).toBeUndefined();
    expect(await directory.findByToken('')).toBeUndefined();
    expect(await directory.findByUsername('')).toBeUndefined();
  });

  it('a rotated token stops resolving', async () => {
    const { directory, users } = await setup(mode);
    const account = users.account('VOLUNTEER', 'alice');
    const { token: old } = await account.create('test-password', PROFILE);

    const fresh = await account.rotateToken();

    expect(await directory.findByToken(old)).toBeUndefined();
    expect((await directory.findByToken(fresh))?.user.username).toBe('alice');
  });

  it('skips malformed documents', async () => {
    const { store, directory, users } = await setup(mode);
    store.putRaw('Volunteer/broken/user_data.json', '{ nope');
    store.putRaw('Volunteer/partial/user_data.json', JSON.stringify({ username: 'partial' }));
    await users.account('VOLUNTEER', 'alice').create('test-password', PROFILE);

    expect(await directory.findByUsername('broken')).toBeUndefined();
    expect(await directory.findByUsername('partial')).toBeUndefined();
    expect((await directory.findByUsername('alice'))?.role).toBe('VOLUNTEER');
  });

  it('returns fresh document contents, not what was indexed', async () => {
    const { store, directory, users } = await setup(mode);
    await users.account('VOLUNTEER', 'alice').create('test-password', PROFILE);
    await directory.findByUsername('alice');

    await store.update('Volunteer/alice/user_data.json', (doc) => {
      doc.followers = ['bob'];
      return { write: true, value: undefined };
    });

    expect((await directory.findByUsername('alice'))?.user.followers).toEqual(['bob']);
  });
});

describe('MemoryDirectoryIndex', () => {
  it('warm-up indexes documents that already exist', async () => {
    const store = new InMemDocumentStore();
    const writer = createTestUsers(store);
    const existing = await writer.account('ORGANIZER', 'org1').create('test-password', PROFILE);

    const { directory } = createDirectoryModule({ store, logger, mode: 'memory' });
    await directory.warm();

    expect((await directory.findByToken(existing.token))?.user.username).toBe('org1');
  });

  it('forgets an account whose document disappeared', async () => {
    const store = new InMemDocumentStore();
    const { directory } = createDirectoryModule({ store, logger, mode: 'memory' });
    const users = createTestUsers(store, (user) => directory.record(user));
    const alice = await users.account('VOLUNTEER', 'alice').create('test-password', PROFILE);

    store.putRaw('Volunteer/alice/user_data.json', 'gone');

    expect(await directory.findByToken(alice.token)).toBeUndefined();
    expect(await directory.findByUsername('alice')).toBeUndefined();
  });

  it('accounts written behind its back appear only after refresh()', async () => {
    const store = new InMemDocumentStore();
    const directory = new MemoryDirectoryIndex({
      store,
      scan: new ScanDirectoryIndex(store, logger),
      logger,
    });
    await directory.warm();

    // no listener: the index is not told about this write
    await createTestUsers(store).account('VOLUNTEER', 'bob').create('test-password', PROFILE);
    expect(await directory.findByUsername('bob')).toBeUndefined();

    await directory.refresh();
    expect((await directory.findByUsername('bob'))?.role).toBe('VOLUNTEER');
    expect(directory.size).toBe(1);
  });
});
