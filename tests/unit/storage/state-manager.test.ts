import { describe, it, expect, beforeEach } from 'vitest';
import { StateManager } from '../../../src/storage/state-manager.js';
import { StateFormatError } from '../../../src/storage/persisted-state.js';
import { CommunityStore } from '../../../src/schedule/community-store.js';
import { PostLog } from '../../../src/schedule/post-log.js';
import { PersistenceError } from '../../../src/core/errors.js';
import {
  MemoryStorage,
  createCommunity,
  createEventDefinition,
  createMockLogger,
} from '../../helpers/factories.js';

describe('StateManager', () => {
  let storage: MemoryStorage;
  let logger: ReturnType<typeof createMockLogger>;
  let manager: StateManager;

  beforeEach(() => {
    storage = new MemoryStorage();
    logger = createMockLogger();
    manager = new StateManager(storage, logger);
  });

  it('starts fresh when nothing is stored', async () => {
    const { store, postLog } = await manager.load();

    expect(store.snapshot()).toEqual([]);
    expect(postLog.size).toBe(0);
    expect(logger.info).toHaveBeenCalledWith(
      { communities: 0, events: 0, postLogEntries: 0 },
      'No saved state found, starting fresh'
    );
  });

  it('round-trips communities and the post-log', async () => {
    const store = new CommunityStore([
      createCommunity([createEventDefinition({ mentionRoleId: 'role-1' })]),
    ]);
    const postLog = new PostLog();
    postLog.record({
      communityId: 'guild-1',
      eventKey: 'raid night',
      occurrenceStart: new Date('2026-03-05T19:00:00Z'),
      offsetMinutes: 30,
    });

    await manager.saveCommunities(store);
    await manager.savePostLog(postLog);
    const loaded = await new StateManager(storage, logger).load();

    expect(loaded.store.snapshot()).toEqual(store.snapshot());
    expect(loaded.postLog.toJSON()).toEqual(postLog.toJSON());
  });

  it('drops invalid events and keeps the rest', async () => {
    storage.documents.set(
      'communities',
      JSON.stringify({
        version: 1,
        communities: {
          'guild-1': {
            communityId: 'guild-1',
            announceChannelId: 'channel-1',
            events: {
              'raid night': createEventDefinition(),
              bad: createEventDefinition({ key: 'bad', startTime: '25:00' }),
              mismatch: createEventDefinition(),
            },
          },
        },
      })
    );

    const { store } = await manager.load();

    expect(store.listEvents('guild-1').map((e) => e.key)).toEqual(['raid night']);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it('drops invalid post-log entries', async () => {
    storage.documents.set(
      'post-log',
      JSON.stringify({
        version: 1,
        entries: [
          {
            communityId: 'guild-1',
            eventKey: 'raid night',
            occurrenceStart: '2026-03-05T19:00:00.000Z',
            offsetMinutes: 0,
          },
          { communityId: 'guild-1', eventKey: 'raid night', occurrenceStart: 'yesterday' },
        ],
      })
    );

    const { postLog } = await manager.load();

    expect(postLog.size).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith({ dropped: 1 }, 'Dropped invalid post-log entries');
  });

  it('fails to load a document with the wrong shape', async () => {
    storage.documents.set('communities', JSON.stringify({ version: 1, communities: [] }));

    await expect(manager.load()).rejects.toBeInstanceOf(StateFormatError);
  });

  it('refuses a document written by a newer version', async () => {
    storage.documents.set('post-log', JSON.stringify({ version: 2, entries: [] }));

    await expect(manager.load()).rejects.toThrow(
      'Persisted post-log document is invalid: version 2 is newer than supported 1'
    );
    expect(storage.documents.get('post-log')).toBe(JSON.stringify({ version: 2, entries: [] }));
  });

  it('wraps save failures in PersistenceError', async () => {
    storage.failSaves = new Error('disk full');

    await expect(manager.savePostLog(new PostLog())).rejects.toBeInstanceOf(PersistenceError);
    expect(logger.error).toHaveBeenCalledWith(
      { key: 'post-log', error: storage.failSaves },
      'Failed to save state'
    );
  });

  it('uses the configured document keys', async () => {
    const custom = new StateManager(storage, logger, { communitiesKey: 'guilds' });

    await custom.saveCommunities(new CommunityStore());

    expect(storage.documents.has('guilds')).toBe(true);
    expect(storage.documents.has('communities')).toBe(false);
  });
});
