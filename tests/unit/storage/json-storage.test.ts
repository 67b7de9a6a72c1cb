import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { JSONStorage, createJSONStorage } from '../../../src/storage/json-storage.js';
import { createMockLogger } from '../../helpers/factories.js';

describe('JSONStorage', () => {
  let dir: string;
  let storage: JSONStorage;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'raidbell-storage-'));
    storage = createJSONStorage(join(dir, 'state'), { logger: createMockLogger() });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null for a missing key', async () => {
    expect(await storage.load('communities')).toBeNull();
    expect(await storage.exists('communities')).toBe(false);
  });

  it('creates the directory and round-trips a document', async () => {
    await storage.save('communities', { version: 1, communities: {} });

    expect(await storage.load('communities')).toEqual({ version: 1, communities: {} });
    expect(await storage.exists('communities')).toBe(true);
  });

  it('keeps the previous version as a backup', async () => {
    await storage.save('post-log', { version: 1, entries: [] });
    await storage.save('post-log', { version: 1, entries: ['x'] });

    const backup = await readFile(join(dir, 'state', 'post-log.backup.json'), 'utf-8');
    expect(JSON.parse(backup)).toEqual({ version: 1, entries: [] });
  });

  it('falls back to the backup when the primary file is corrupt', async () => {
    await storage.save('post-log', { version: 1, entries: [] });
    await storage.save('post-log', { version: 1, entries: ['x'] });
    await writeFile(join(dir, 'state', 'post-log.json'), '{ not json', 'utf-8');

    expect(await storage.load('post-log')).toEqual({ version: 1, entries: [] });
  });

  it('applies concurrent writes to one key in call order', async () => {
    await Promise.all([
      storage.save('communities', { n: 1 }),
      storage.save('communities', { n: 2 }),
      storage.save('communities', { n: 3 }),
    ]);

    expect(await storage.load('communities')).toEqual({ n: 3 });
  });

  it('snapshots the data at call time', async () => {
    const data = { n: 1 };
    const pending = storage.save('communities', data);
    data.n = 2;
    await pending;

    expect(await storage.load('communities')).toEqual({ n: 1 });
  });

  it('deletes a key', async () => {
    await storage.save('communities', {});

    expect(await storage.delete('communities')).toBe(true);
    expect(await storage.delete('communities')).toBe(false);
    expect(await storage.load('communities')).toBeNull();
  });
});
