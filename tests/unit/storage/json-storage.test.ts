import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { JSONStorage } from '../../../src/storage/json-storage.js';
import { createMockLogger } from '../../helpers/factories.js';

describe('JSONStorage', () => {
  let dir: string;
  let storage: JSONStorage;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'json-storage-test-'));
    storage = new JSONStorage({ basePath: join(dir, 'state'), logger: createMockLogger() });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null for a missing key', async () => {
    expect(await storage.load('delivery-queue')).toBeNull();
    expect(await storage.exists('delivery-queue')).toBe(false);
  });

  it('round-trips a value and keeps the previous version', async () => {
    await storage.save('delivery-queue', [{ id: 'a' }]);
    await storage.save('delivery-queue', [{ id: 'b' }]);

    expect(await storage.load('delivery-queue')).toEqual([{ id: 'b' }]);
    expect((await readdir(join(dir, 'state'))).sort()).toEqual([
      'delivery-queue.backup.json',
      'delivery-queue.json',
    ]);
  });

  it('falls back to the previous version when the file is corrupted', async () => {
    await storage.save('encounters', { version: 1, tags: { a: [1] } });
    await storage.save('encounters', { version: 1, tags: { a: [1, 2] } });
    await writeFile(join(dir, 'state', 'encounters.json'), '{"version": 1, "ta');

    expect(await storage.load('encounters')).toEqual({ version: 1, tags: { a: [1] } });
  });

  it('throws on a corrupted file without a backup', async () => {
    const noBackup = new JSONStorage({ basePath: join(dir, 'state'), createBackup: false });
    await noBackup.save('encounters', {});
    await writeFile(join(dir, 'state', 'encounters.json'), 'not json');

    await expect(noBackup.load('encounters')).rejects.toThrow(SyntaxError);
  });

  it('deletes a key with its previous version', async () => {
    await storage.save('encounters', { version: 1 });
    await storage.save('encounters', { version: 2 });

    expect(await storage.delete('encounters')).toBe(true);
    expect(await storage.delete('encounters')).toBe(false);
    expect(await storage.load('encounters')).toBeNull();
    expect(await readdir(join(dir, 'state'))).toEqual([]);
  });

  it('keeps the real file in place while saving over it', async () => {
    await storage.save('delivery-queue', [{ id: 'a' }]);
    await storage.save('delivery-queue', [{ id: 'b' }]);

    expect(JSON.parse(await readFile(join(dir, 'state', 'delivery-queue.backup.json'), 'utf-8'))).toEqual([
      { id: 'a' },
    ]);
  });

  describe('after a save was interrupted', () => {
    beforeEach(async () => {
      await mkdir(join(dir, 'state'));
    });

    it('loads the finished temp file when the real file is missing', async () => {
      await writeFile(join(dir, 'state', 'delivery-queue.backup.json'), '[{"id":"old"}]');
      await writeFile(join(dir, 'state', 'delivery-queue.tmp.json'), '[{"id":"new"}]');

      expect(await storage.load('delivery-queue')).toEqual([{ id: 'new' }]);
    });

    it('falls back to the previous version when the temp file is cut short', async () => {
      await writeFile(join(dir, 'state', 'delivery-queue.backup.json'), '[{"id":"old"}]');
      await writeFile(join(dir, 'state', 'delivery-queue.tmp.json'), '[{"id":"ne');

      expect(await storage.load('delivery-queue')).toEqual([{ id: 'old' }]);
    });

    it('ignores a leftover temp file while the real file exists', async () => {
      await writeFile(join(dir, 'state', 'delivery-queue.json'), '[{"id":"current"}]');
      await writeFile(join(dir, 'state', 'delivery-queue.tmp.json'), '[{"id":"ne');

      expect(await storage.load('delivery-queue')).toEqual([{ id: 'current' }]);
    });
  });
});
