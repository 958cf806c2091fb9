import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DEAD_LETTER_KEY,
  DeliveryPipeline,
  MANIFEST_KEY,
  type DeliveryPipelineConfig,
  type DeliveryPipelineDeps,
} from '../../../src/delivery/delivery-pipeline.js';
import { BackupStore } from '../../../src/delivery/backup-store.js';
import { createDeliveryItem, transition } from '../../../src/delivery/delivery-item.js';
import type { TransportPort } from '../../../src/ports/index.js';
import type { DeliveryItem, DeliveryRequest, TransportResult } from '../../../src/types/index.js';
import { createBacklogDigest } from '../../../src/pipeline/digest.js';
import { ManualClock } from '../../helpers/manual-clock.js';
import {
  createMemoryStorage,
  createMockLogger,
  createNotificationRequest,
  createUploadRequest,
  loggedMessages,
  type MockLogger,
} from '../../helpers/factories.js';

const FAIL: TransportResult = { ok: false, retryable: true, error: 'HTTP 502' };

/**
 * Transport that plays back a script of results, then keeps succeeding.
 */
function createScriptedTransport(name: string, script: TransportResult[] = []) {
  const sent: DeliveryItem[] = [];
  const transport = {
    name,
    sent,
    send: vi.fn<TransportPort['send']>((item) => {
      sent.push(structuredClone(item));
      const result: TransportResult = script.shift() ?? {
        ok: true,
        link: `https://share.test/${item.id}`,
      };
      return Promise.resolve(result);
    }),
  };
  return transport;
}

describe('DeliveryPipeline', () => {
  let dir: string;
  let clock: ManualClock;
  let logger: MockLogger;
  let storage: ReturnType<typeof createMemoryStorage>;
  let backups: BackupStore;
  let nextId: number;

  const config: DeliveryPipelineConfig = {
    retry: { baseDelayMs: 30_000, factor: 2, maxDelayMs: 1_800_000, maxAttempts: 8 },
    retryPollMs: 30_000,
    sendTimeoutMs: 30_000,
    deadLetterLimit: 500,
  };

  function createPipeline(
    transports: { upload?: TransportPort; notification?: TransportPort },
    overrides: Partial<DeliveryPipelineConfig> = {},
    extra: Pick<DeliveryPipelineDeps, 'backlogDigest'> = {}
  ): DeliveryPipeline {
    return new DeliveryPipeline(
      { ...config, ...overrides },
      {
        transports: {
          upload: transports.upload ?? createScriptedTransport('upload'),
          notification: transports.notification ?? createScriptedTransport('notification'),
        },
        storage,
        backups,
        clock,
        logger,
        createId: () => `item-${String(++nextId)}`,
        ...extra,
      }
    );
  }

  async function createArtifact(name: string): Promise<string> {
    const path = join(dir, 'photos', name);
    await writeFile(path, 'jpeg-bytes');
    return path;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'delivery-test-'));
    await mkdir(join(dir, 'photos'));
    clock = new ManualClock();
    logger = createMockLogger();
    storage = createMemoryStorage();
    backups = new BackupStore(join(dir, 'backup'), logger);
    nextId = 0;
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('delivers on the first attempt without touching the manifest', async () => {
    const pipeline = createPipeline({});

    const outcome = await pipeline.deliver(createNotificationRequest());

    expect(outcome).toEqual({ status: 'delivered', itemId: 'item-1', link: 'https://share.test/item-1' });
    expect(storage.save).not.toHaveBeenCalled();
  });

  it('backs up a failed upload and delivers it on a later retry', async () => {
    const upload = createScriptedTransport('upload', [FAIL, FAIL]);
    const pipeline = createPipeline({ upload });
    const artifact = await createArtifact('a.jpg');
    const backupPath = join(dir, 'backup', 'item-1-a.jpg');

    const outcome = await pipeline.deliver(createUploadRequest(artifact));
    expect(outcome).toEqual({ status: 'queued', itemId: 'item-1', nextAttemptAt: 30_000 });
    expect(existsSync(backupPath)).toBe(true);

    const [queued] = await pipeline.getBacklog();
    expect(queued?.status).toBe('in_flight');
    expect(queued?.attemptCount).toBe(1);
    expect(queued?.lastError).toBe('HTTP 502');

    // Not due yet
    expect(await pipeline.runOnce()).toEqual({ attempted: 0, delivered: 0, rescheduled: 0, failed: 0 });

    await clock.advance(30_000);
    expect(await pipeline.runOnce()).toEqual({ attempted: 1, delivered: 0, rescheduled: 1, failed: 0 });
    expect((await pipeline.getBacklog())[0]?.nextAttemptAt).toBe(90_000);

    await clock.advance(60_000);
    expect(await pipeline.runOnce()).toEqual({ attempted: 1, delivered: 1, rescheduled: 0, failed: 0 });

    expect(await pipeline.getBacklog()).toEqual([]);
    expect(storage.data.get(MANIFEST_KEY)).toEqual([]);
    expect(existsSync(backupPath)).toBe(false);
    expect(upload.sent.map((item) => item.attemptCount)).toEqual([0, 1, 2]);
    const lastSent = upload.sent[2];
    expect(lastSent?.kind === 'upload' ? lastSent.payload.backupPath : undefined).toBe(backupPath);
  });

  it('fails an item permanently after maxAttempts', async () => {
    const notification = createScriptedTransport('notification', [FAIL, FAIL, FAIL]);
    const pipeline = createPipeline({ notification }, { retry: { ...config.retry, maxAttempts: 3 } });

    await pipeline.deliver(createNotificationRequest());
    expect(await pipeline.runOnce(true)).toEqual({ attempted: 1, delivered: 0, rescheduled: 1, failed: 0 });
    expect(await pipeline.runOnce(true)).toEqual({ attempted: 1, delivered: 0, rescheduled: 0, failed: 1 });

    expect(await pipeline.getBacklog()).toEqual([]);
    const deadLetters = await pipeline.getDeadLetters();
    expect(deadLetters).toHaveLength(1);
    expect(deadLetters[0]).toMatchObject({
      id: 'item-1',
      status: 'failed_permanently',
      attemptCount: 3,
      lastError: 'HTTP 502',
    });
    expect(notification.send).toHaveBeenCalledTimes(3);
  });

  it('fails a non-retryable error without queueing', async () => {
    const notification = createScriptedTransport('notification', [
      { ok: false, retryable: false, error: 'chat not found' },
    ]);
    const pipeline = createPipeline({ notification });

    const outcome = await pipeline.deliver(createNotificationRequest());

    expect(outcome).toEqual({ status: 'failed_permanently', itemId: 'item-1', error: 'chat not found' });
    expect(await pipeline.getBacklog()).toEqual([]);
    expect((await pipeline.getDeadLetters()).map((item) => item.id)).toEqual(['item-1']);
  });

  it('treats a thrown transport error as retryable', async () => {
    const notification: TransportPort = {
      name: 'notification',
      send: () => Promise.reject(new Error('socket hang up')),
    };
    const pipeline = createPipeline({ notification });

    const outcome = await pipeline.deliver(createNotificationRequest());

    expect(outcome).toEqual({ status: 'queued', itemId: 'item-1', nextAttemptAt: 30_000 });
    expect((await pipeline.getBacklog())[0]?.lastError).toBe('socket hang up');
  });

  it('bounds a hanging transport by the send timeout', async () => {
    const notification: TransportPort = {
      name: 'notification',
      send: () => new Promise<TransportResult>(() => undefined),
    };
    const pipeline = createPipeline({ notification });

    const pending = pipeline.deliver(createNotificationRequest());
    await clock.advance(30_000);

    expect(await pending).toEqual({ status: 'queued', itemId: 'item-1', nextAttemptAt: 60_000 });
    expect((await pipeline.getBacklog())[0]?.lastError).toBe('Operation timed out after 30000ms');
  });

  it('fails an upload whose artifact cannot be backed up', async () => {
    const upload = createScriptedTransport('upload', [FAIL]);
    const pipeline = createPipeline({ upload });

    const outcome = await pipeline.deliver(createUploadRequest(join(dir, 'photos', 'missing.jpg')));

    expect(outcome.status).toBe('failed_permanently');
    expect(outcome.status === 'failed_permanently' ? outcome.error : '').toMatch(/^backup_failed: /);
    expect(loggedMessages(logger, 'error')).toEqual(['Failed to back up artifact']);
  });

  it('keeps only the newest dead letters', async () => {
    const notification = createScriptedTransport(
      'notification',
      [1, 2, 3].map((): TransportResult => ({ ok: false, retryable: false, error: 'forbidden' }))
    );
    const pipeline = createPipeline({ notification }, { deadLetterLimit: 2 });

    for (let i = 0; i < 3; i++) {
      await pipeline.deliver(createNotificationRequest());
    }

    expect((await pipeline.getDeadLetters()).map((item) => item.id)).toEqual(['item-2', 'item-3']);
  });

  describe('recover', () => {
    function persisted(
      id: string,
      request: DeliveryRequest,
      status: DeliveryItem['status']
    ): DeliveryItem {
      const item = createDeliveryItem(request, 0, id);
      if (status !== 'pending') {
        transition(item, 'in_flight');
      }
      if (status === 'delivered') {
        transition(item, 'delivered');
      }
      return item;
    }

    it('requeues interrupted items and fails uploads whose copy is gone', async () => {
      const backupPath = await createArtifact('kept.jpg');
      const withBackup = persisted('up-1', createUploadRequest('/gone/original.jpg'), 'in_flight');
      if (withBackup.kind === 'upload') {
        withBackup.payload.backupPath = backupPath;
      }
      storage.data.set(MANIFEST_KEY, [
        withBackup,
        persisted('up-2', createUploadRequest(join(dir, 'photos', 'missing.jpg')), 'pending'),
        persisted('note-1', createNotificationRequest(), 'pending'),
        persisted('note-2', createNotificationRequest(), 'delivered'),
        { foo: 1 },
      ]);
      const pipeline = createPipeline({});

      expect(await pipeline.recover()).toEqual({ recovered: 2, failed: 1 });

      const backlog = await pipeline.getBacklog();
      expect(backlog.map((item) => [item.id, item.status])).toEqual([
        ['up-1', 'in_flight'],
        ['note-1', 'in_flight'],
      ]);
      expect(storage.data.get(MANIFEST_KEY)).toEqual(backlog);

      const deadLetters = await pipeline.getDeadLetters();
      expect(deadLetters.map((item) => [item.id, item.status, item.lastError])).toEqual([
        ['up-2', 'failed_permanently', 'backup_missing'],
      ]);
      expect(loggedMessages(logger, 'warn')).toContain('Dropped unreadable manifest entries');
    });

    it('starts empty with no manifest', async () => {
      const pipeline = createPipeline({});
      expect(await pipeline.recover()).toEqual({ recovered: 0, failed: 0 });
      expect(storage.data.get(DEAD_LETTER_KEY)).toBeUndefined();
    });

    it('retries recovered items on the next pass', async () => {
      storage.data.set(MANIFEST_KEY, [persisted('note-1', createNotificationRequest(), 'in_flight')]);
      const notification = createScriptedTransport('notification');
      const pipeline = createPipeline({ notification });

      await pipeline.recover();
      expect(await pipeline.runOnce()).toEqual({ attempted: 1, delivered: 1, rescheduled: 0, failed: 0 });
      expect(notification.sent.map((item) => item.id)).toEqual(['note-1']);
    });
  });

  describe('retry worker', () => {
    it('retries due items on its own schedule', async () => {
      const notification = createScriptedTransport('notification', [FAIL]);
      const pipeline = createPipeline({ notification });
      pipeline.start();

      await pipeline.deliver(createNotificationRequest());
      await clock.advance(30_000);
      await pipeline.stop(1000);

      expect(await pipeline.getBacklog()).toEqual([]);
      expect(notification.send).toHaveBeenCalledTimes(2);
      expect(loggedMessages(logger, 'info')).toContain('Delivered on retry');
    });

    it('stops without a pass in progress', async () => {
      const pipeline = createPipeline({});
      pipeline.start();
      await pipeline.stop(1000);

      expect(clock.pendingTimers).toBe(0);
      expect(loggedMessages(logger, 'info')).toEqual(['Retry worker started', 'Retry worker stopped']);
    });
  });
  describe('backlog digest', () => {
    async function queueNotifications(pipeline: DeliveryPipeline, chatIds: string[]): Promise<void> {
      for (const chatId of chatIds) {
        await pipeline.deliver(createNotificationRequest('Pet detected', chatId));
      }
    }

    it('folds a large backlog for one chat into a single message', async () => {
      const notification = createScriptedTransport('notification', [FAIL, FAIL, FAIL, FAIL]);
      const pipeline = createPipeline(
        { notification },
        { digestThreshold: 3 },
        { backlogDigest: createBacklogDigest }
      );
      await queueNotifications(pipeline, ['1001', '1001', '1001', '2002']);

      const result = await pipeline.runOnce(true);

      expect(result).toEqual({ attempted: 4, delivered: 4, rescheduled: 0, failed: 0 });
      expect(notification.sent.slice(4).map((item) => item.id)).toEqual(['item-5', 'item-4']);
      expect(notification.sent[4]).toMatchObject({
        destination: '1001',
        payload: {
          tagId: 'digest',
          text: '🐾 Pet digest\nDetections: 3 from 1 pets\nPeriod: 1 hour\nMost active: ...496836 (3x)',
        },
      });
      expect(await pipeline.getBacklog()).toEqual([]);
    });

    it('reschedules every folded item when the digest fails', async () => {
      const notification = createScriptedTransport('notification', [FAIL, FAIL, FAIL, FAIL]);
      const pipeline = createPipeline(
        { notification },
        { digestThreshold: 3 },
        { backlogDigest: createBacklogDigest }
      );
      await queueNotifications(pipeline, ['1001', '1001', '1001']);

      const result = await pipeline.runOnce(true);

      expect(result).toEqual({ attempted: 3, delivered: 0, rescheduled: 3, failed: 0 });
      const backlog = await pipeline.getBacklog();
      expect(backlog.map((item) => [item.id, item.attemptCount, item.nextAttemptAt])).toEqual([
        ['item-1', 2, 60_000],
        ['item-2', 2, 60_000],
        ['item-3', 2, 60_000],
      ]);
      expect(loggedMessages(logger, 'warn')).toContain('Backlog digest failed');
    });

    it('retries items one by one below the threshold', async () => {
      const notification = createScriptedTransport('notification', [FAIL, FAIL]);
      const pipeline = createPipeline(
        { notification },
        { digestThreshold: 3 },
        { backlogDigest: createBacklogDigest }
      );
      await queueNotifications(pipeline, ['1001', '1001']);

      await pipeline.runOnce(true);

      expect(notification.sent.slice(2).map((item) => item.id)).toEqual(['item-1', 'item-2']);
    });
  });

  it('sees items another process delivered from the shared manifest', async () => {
    const daemon = createPipeline({
      notification: createScriptedTransport('notification', [FAIL, FAIL]),
    });
    const cli = createPipeline({});

    await daemon.deliver(createNotificationRequest());
    expect(await cli.runOnce(true)).toEqual({ attempted: 1, delivered: 1, rescheduled: 0, failed: 0 });
    await daemon.deliver(createNotificationRequest());

    expect((await daemon.getBacklog()).map((item) => item.id)).toEqual(['item-2']);
  });
});
