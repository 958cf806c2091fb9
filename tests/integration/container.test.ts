import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createContainerAsync } from '../../src/core/container.js';
import { createDeliveryItem, transition } from '../../src/delivery/index.js';
import { NoopCapture } from '../../src/adapters/index.js';
import type { TransportPort } from '../../src/ports/index.js';
import type { TransportResult } from '../../src/types/index.js';
import { ManualClock } from '../helpers/manual-clock.js';
import { createMockLogger, createNotificationRequest, loggedMessages } from '../helpers/factories.js';

const T0 = Date.UTC(2024, 2, 4, 14, 0, 0);
const TAG = '123456789012345';

describe('createContainerAsync', () => {
  let dir: string;
  let sent: string[];

  const notification: TransportPort = {
    name: 'notification',
    send: (item) => {
      sent.push(item.id);
      const result: TransportResult = { ok: true };
      return Promise.resolve(result);
    },
  };
  const upload: TransportPort = {
    name: 'upload',
    send: () => {
      const result: TransportResult = { ok: true };
      return Promise.resolve(result);
    },
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'container-test-'));
    sent = [];
    await mkdir(join(dir, 'config'));
    await mkdir(join(dir, 'state'));
    await writeFile(
      join(dir, 'config', 'chipwatch.json'),
      JSON.stringify({
        reader: { port: 'simulate' },
        telegram: { chatIds: ['1001'] },
        capture: { cameras: [] },
      })
    );
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function boot(env: NodeJS.ProcessEnv = {}) {
    return createContainerAsync({
      env: { DATA_PATH: dir, TELEGRAM_BOT_TOKEN: 'test-token', ...env },
      clock: new ManualClock(T0),
      logger: createMockLogger(),
      capture: new NoopCapture(),
      classifier: { classify: () => Promise.resolve(null) },
      transports: { upload, notification },
    });
  }

  it('loads configuration from DATA_PATH and the environment', async () => {
    const container = await boot({ RCLONE_REMOTE: '' });

    expect(container.config.reader.port).toBe('simulate');
    expect(container.config.telegram).toEqual({ botToken: 'test-token', chatIds: ['1001'] });
    expect(container.config.paths.state).toBe(join(dir, 'state'));
    expect(container.orchestrator.getState()).toBe('idle');

    await container.shutdown();
  });

  it('restores the encounter ledger and the delivery backlog', async () => {
    await writeFile(
      join(dir, 'state', 'encounters.json'),
      JSON.stringify({ version: 1, tags: { [TAG]: [T0 - 60_000, T0 - 1000] } })
    );
    const interrupted = createDeliveryItem(createNotificationRequest('hi', '1001'), T0 - 5000, 'note-1');
    transition(interrupted, 'in_flight');
    await writeFile(join(dir, 'state', 'delivery-queue.json'), JSON.stringify([interrupted]));

    const container = await boot();

    expect(container.ledger.stats(TAG, T0, 30 * 60_000)).toEqual({ recentCount: 2, totalCount: 2 });
    expect((await container.delivery.getBacklog()).map((item) => item.id)).toEqual(['note-1']);

    expect(await container.delivery.runOnce(true)).toMatchObject({ attempted: 1, delivered: 1 });
    expect(sent).toEqual(['note-1']);
    expect(JSON.parse(await readFile(join(dir, 'state', 'delivery-queue.json'), 'utf-8'))).toEqual([]);

    await container.shutdown();
  });

  it('warns when notifications and uploads are not configured', async () => {
    const logger = createMockLogger();
    const container = await createContainerAsync({
      env: { DATA_PATH: dir },
      clock: new ManualClock(T0),
      logger,
      capture: new NoopCapture(),
      classifier: { classify: () => Promise.resolve(null) },
      transports: { upload, notification },
    });

    expect(loggedMessages(logger, 'warn')).toEqual([
      'Telegram not configured, notifications disabled',
      'No rclone remote configured, photos stay local',
    ]);

    await container.shutdown();
  });

  it('shuts down once however often it is called', async () => {
    const container = await boot();
    container.orchestrator.start();

    await Promise.all([container.shutdown(), container.shutdown()]);

    expect(container.orchestrator.getState()).toBe('stopped');
  });
});
