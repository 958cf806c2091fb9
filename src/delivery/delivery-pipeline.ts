import type { Clock, ClockTimer, TransportPort } from '../ports/index.js';
import type {
  DeliveryItem,
  DeliveryOutcome,
  DeliveryRequest,
  Logger,
  NotificationItem,
  TransportResult,
} from '../types/index.js';
import type { Storage } from '../storage/index.js';
import type { BackupStore } from './backup-store.js';
import { withTimeout, TimeoutError } from '../core/circuit-breaker.js';
import { errorMessage } from '../core/errors.js';
import { KeyedSerialQueue } from '../core/keyed-queue.js';
import { createTraceContext, withTraceContext } from '../core/trace-context.js';
import { createDeliveryItem, parseDeliveryItems, transition } from './delivery-item.js';
import { RetryPolicy, type RetryPolicyConfig } from './retry-policy.js';

export const MANIFEST_KEY = 'delivery-queue';
export const DEAD_LETTER_KEY = 'delivery-dead-letter';

export interface DeliveryPipelineConfig {
  retry: RetryPolicyConfig;
  /** How often the retry worker looks for due items */
  retryPollMs: number;
  /** Bound on a single transport call */
  sendTimeoutMs: number;
  /** Dead-letter entries kept (oldest dropped first) */
  deadLetterLimit: number;
  /**
   * Due notifications for one recipient at or above this count go out as
   * a single digest (0 or unset: never)
   */
  digestThreshold?: number | undefined;
}

export const DEFAULT_DELIVERY_CONFIG: Omit<DeliveryPipelineConfig, 'retry'> = {
  retryPollMs: 30_000,
  sendTimeoutMs: 30_000,
  deadLetterLimit: 500,
};

export interface DeliveryTransports {
  upload: TransportPort;
  notification: TransportPort;
}

export interface DeliveryPipelineDeps {
  transports: DeliveryTransports;
  /** Durable storage for the manifest and dead-letter list */
  storage: Storage;
  backups: BackupStore;
  clock: Clock;
  logger: Logger;
  /** Item id factory (default: random UUID) */
  createId?: (() => string) | undefined;
  /** Text of the message that replaces a notification backlog */
  backlogDigest?: ((items: readonly NotificationItem[]) => string) | undefined;
}

export interface RetryPassResult {
  attempted: number;
  delivered: number;
  rescheduled: number;
  failed: number;
}

export interface RecoveryResult {
  /** Items back in the retry queue */
  recovered: number;
  /** Items failed during recovery (backup gone, unreadable entry) */
  failed: number;
}

type TransportFailure = Extract<TransportResult, { ok: false }>;
type RetryOutcome = 'delivered' | 'rescheduled' | 'failed';

const MANIFEST_QUEUE_KEY = 'manifest';
const PASS_QUEUE_KEY = 'pass';

/**
 * DeliveryPipeline - at-least-once delivery of uploads and notifications.
 *
 * deliver() makes the first attempt inline. A failed attempt is written to
 * the manifest (with a local copy of the artifact for uploads) and the
 * retry worker picks it up with exponential backoff until it succeeds or
 * runs out of attempts.
 *
 * Every manifest read-modify-write runs on one serial queue and reads the
 * stored manifest afresh, so a second process working the same backlog
 * (the process-queue CLI) does not see its saved changes undone by a stale
 * copy. The two processes are not locked against each other. The storage
 * behind it writes atomically.
 */
export class DeliveryPipeline {
  private readonly config: DeliveryPipelineConfig;
  private readonly policy: RetryPolicy;
  private readonly transports: DeliveryTransports;
  private readonly storage: Storage;
  private readonly backups: BackupStore;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly createId: (() => string) | undefined;
  private readonly backlogDigest: ((items: readonly NotificationItem[]) => string) | undefined;
  private readonly queue = new KeyedSerialQueue();

  private workerTimer: ClockTimer | null = null;
  private running = false;
  private stopping = false;
  private currentPass: Promise<RetryPassResult> | null = null;

  constructor(config: DeliveryPipelineConfig, deps: DeliveryPipelineDeps) {
    this.policy = new RetryPolicy(config.retry);
    this.config = { ...config, retry: this.policy.config };
    this.transports = deps.transports;
    this.storage = deps.storage;
    this.backups = deps.backups;
    this.clock = deps.clock;
    this.logger = deps.logger.child({ component: 'delivery' });
    this.createId = deps.createId;
    this.backlogDigest = deps.backlogDigest;
  }

  /**
   * Attempt a delivery now. Failures are queued for retry, never thrown.
   */
  async deliver(request: DeliveryRequest): Promise<DeliveryOutcome> {
    const now = this.clock.now();
    const item = createDeliveryItem(request, now, this.createId?.());
    transition(item, 'in_flight');

    const result = await this.attempt(item);
    item.attemptCount = 1;

    if (result.ok) {
      transition(item, 'delivered');
      this.logger.info(
        { itemId: item.id, kind: item.kind, destination: item.destination },
        'Delivered'
      );
      return { status: 'delivered', itemId: item.id, link: result.link };
    }

    item.lastError = result.error;

    if (!result.retryable || !this.policy.canRetry(item.attemptCount)) {
      await this.failPermanently(item);
      return { status: 'failed_permanently', itemId: item.id, error: result.error };
    }

    if (item.kind === 'upload') {
      try {
        item.payload.backupPath = await this.backups.store(item.payload.artifactPath, item.id);
      } catch (error) {
        this.logger.error(
          { itemId: item.id, artifactPath: item.payload.artifactPath, error: errorMessage(error) },
          'Failed to back up artifact'
        );
        item.lastError = `backup_failed: ${errorMessage(error)}`;
        await this.failPermanently(item);
        return { status: 'failed_permanently', itemId: item.id, error: item.lastError };
      }
    }

    item.nextAttemptAt = this.policy.nextAttemptAt(this.clock.now(), item.attemptCount);
    await this.withManifest((items) => {
      items.push(item);
      return true;
    });

    this.logger.warn(
      { itemId: item.id, kind: item.kind, error: result.error, nextAttemptAt: item.nextAttemptAt },
      'Delivery failed, queued for retry'
    );
    return { status: 'queued', itemId: item.id, nextAttemptAt: item.nextAttemptAt };
  }

  /**
   * Load the manifest left by a previous run. Items interrupted mid-flight
   * are retried; items whose backup copy is gone are failed.
   */
  async recover(): Promise<RecoveryResult> {
    const failedItems: DeliveryItem[] = [];

    const recovered = await this.queue.run(MANIFEST_QUEUE_KEY, async () => {
      const data = await this.storage.load(MANIFEST_KEY);
      const { items, invalid } = parseDeliveryItems(data);
      if (invalid > 0) {
        this.logger.warn({ invalid }, 'Dropped unreadable manifest entries');
      }

      const kept: DeliveryItem[] = [];
      for (const item of items) {
        if (item.status === 'pending') {
          transition(item, 'in_flight');
        }
        if (item.status !== 'in_flight') {
          continue;
        }
        if (item.kind === 'upload') {
          const source = item.payload.backupPath ?? item.payload.artifactPath;
          if (!(await this.backups.exists(source))) {
            item.lastError = 'backup_missing';
            transition(item, 'failed_permanently');
            failedItems.push(item);
            continue;
          }
        }
        kept.push(item);
      }

      await this.storage.save(MANIFEST_KEY, kept);
      return kept.length;
    });

    for (const item of failedItems) {
      this.logger.warn({ itemId: item.id, reason: item.lastError }, 'Delivery item failed on recovery');
      await this.appendDeadLetter(item);
    }

    if (recovered > 0 || failedItems.length > 0) {
      this.logger.info({ recovered, failed: failedItems.length }, 'Delivery manifest recovered');
    }
    return { recovered, failed: failedItems.length };
  }

  /**
   * Start the background retry worker.
   */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.stopping = false;
    this.scheduleNext();
    this.logger.info({ retryPollMs: this.config.retryPollMs }, 'Retry worker started');
  }

  /**
   * One retry pass over the manifest. With `force`, items are attempted
   * regardless of their next-attempt time. Passes never overlap.
   */
  runOnce(force = false): Promise<RetryPassResult> {
    const pass = this.queue.run(PASS_QUEUE_KEY, () =>
      withTraceContext(createTraceContext('retry'), () => this.retryPass(force))
    );
    this.currentPass = pass;
    return pass;
  }

  /**
   * Stop the worker and wait for a running pass, at most `timeoutMs`.
   */
  async stop(timeoutMs: number): Promise<void> {
    this.running = false;
    this.stopping = true;
    if (this.workerTimer) {
      this.clock.clearTimer(this.workerTimer);
      this.workerTimer = null;
    }

    const pass = this.currentPass;
    if (pass) {
      try {
        await withTimeout(this.clock, timeoutMs, () => pass);
      } catch (error) {
        if (error instanceof TimeoutError) {
          this.logger.warn({ timeoutMs }, 'Retry pass still running at shutdown');
        } else {
          this.logger.error({ error: errorMessage(error) }, 'Retry pass failed during shutdown');
        }
      }
    }
    this.logger.info('Retry worker stopped');
  }

  /** Items waiting for retry */
  async getBacklog(): Promise<DeliveryItem[]> {
    return this.queue.run(MANIFEST_QUEUE_KEY, async () => [...(await this.loadManifest())]);
  }

  async getDeadLetters(): Promise<DeliveryItem[]> {
    return parseDeliveryItems(await this.storage.load(DEAD_LETTER_KEY)).items;
  }

  private scheduleNext(): void {
    if (!this.running) {
      return;
    }
    this.workerTimer = this.clock.setTimer(() => {
      this.workerTimer = null;
      this.runOnce(false)
        .catch((error: unknown) => {
          this.logger.error({ error: errorMessage(error) }, 'Retry pass failed');
        })
        .finally(() => {
          this.scheduleNext();
        });
    }, this.config.retryPollMs);
  }

  private async retryPass(force: boolean): Promise<RetryPassResult> {
    const result: RetryPassResult = { attempted: 0, delivered: 0, rescheduled: 0, failed: 0 };
    const now = this.clock.now();
    const due = await this.queue.run(MANIFEST_QUEUE_KEY, async () =>
      (await this.loadManifest()).filter(
        (item) => item.status === 'in_flight' && (force || item.nextAttemptAt <= now)
      )
    );

    if (due.length === 0) {
      return result;
    }
    this.logger.debug({ due: due.length, force }, 'Retry pass started');

    const digested = new Set<string>();
    for (const [destination, items] of this.digestGroups(due)) {
      if (this.stopping) {
        break;
      }
      result.attempted += items.length;
      for (const item of items) {
        digested.add(item.id);
      }
      try {
        const outcomes = await this.retryAsDigest(destination, items);
        for (const outcome of outcomes) {
          result[outcome]++;
        }
      } catch (error) {
        this.logger.error({ destination, error: errorMessage(error) }, 'Backlog digest crashed');
      }
    }

    for (const item of due) {
      if (this.stopping) {
        break;
      }
      if (digested.has(item.id)) {
        continue;
      }
      result.attempted++;
      try {
        const outcome = await this.retryItem(item);
        result[outcome]++;
      } catch (error) {
        this.logger.error({ itemId: item.id, error: errorMessage(error) }, 'Retry attempt crashed');
      }
    }

    this.logger.info({ ...result }, 'Retry pass finished');
    return result;
  }

  /**
   * Notification items grouped by recipient, for recipients whose due
   * backlog reached the digest threshold.
   */
  private digestGroups(due: readonly DeliveryItem[]): Map<string, NotificationItem[]> {
    const groups = new Map<string, NotificationItem[]>();
    const threshold = this.config.digestThreshold ?? 0;
    if (threshold <= 0 || !this.backlogDigest) {
      return groups;
    }

    for (const item of due) {
      if (item.kind !== 'notification') continue;
      const group = groups.get(item.destination) ?? [];
      group.push(item);
      groups.set(item.destination, group);
    }
    for (const [destination, items] of groups) {
      if (items.length < threshold) {
        groups.delete(destination);
      }
    }
    return groups;
  }

  /**
   * Send one summary in place of `items`. Success delivers all of them;
   * a failure counts as a failed attempt for each.
   */
  private async retryAsDigest(
    destination: string,
    items: NotificationItem[]
  ): Promise<RetryOutcome[]> {
    const build = this.backlogDigest;
    if (!build) {
      return [];
    }

    const digest = createDeliveryItem(
      { kind: 'notification', destination, payload: { tagId: 'digest', text: build(items) } },
      this.clock.now(),
      this.createId?.()
    );
    transition(digest, 'in_flight');
    const result = await this.attempt(digest);

    for (const item of items) {
      item.attemptCount++;
    }

    if (result.ok) {
      const ids = new Set(items.map((item) => item.id));
      for (const item of items) {
        transition(item, 'delivered');
      }
      await this.withManifest((entries) => {
        const kept = entries.filter((entry) => !ids.has(entry.id));
        if (kept.length === entries.length) {
          return false;
        }
        entries.splice(0, entries.length, ...kept);
        return true;
      });
      this.logger.info({ destination, items: items.length }, 'Backlog digest delivered');
      return items.map((): RetryOutcome => 'delivered');
    }

    this.logger.warn(
      { destination, items: items.length, error: result.error },
      'Backlog digest failed'
    );
    const outcomes: RetryOutcome[] = [];
    for (const item of items) {
      outcomes.push(await this.handleFailure(item, result));
    }
    return outcomes;
  }

  private async retryItem(item: DeliveryItem): Promise<RetryOutcome> {
    if (item.kind === 'upload' && item.payload.backupPath !== undefined) {
      if (!(await this.backups.exists(item.payload.backupPath))) {
        item.lastError = 'backup_missing';
        await this.removeFromManifest(item.id);
        await this.failPermanently(item);
        return 'failed';
      }
    }

    const result = await this.attempt(item);
    item.attemptCount++;

    if (result.ok) {
      transition(item, 'delivered');
      await this.removeFromManifest(item.id);
      if (item.kind === 'upload' && item.payload.backupPath !== undefined) {
        await this.backups.remove(item.payload.backupPath);
      }
      this.logger.info({ itemId: item.id, attempts: item.attemptCount }, 'Delivered on retry');
      return 'delivered';
    }

    return this.handleFailure(item, result);
  }

  /**
   * Record a failed attempt: reschedule, or fail for good when the error
   * is permanent or attempts ran out.
   */
  private async handleFailure(item: DeliveryItem, result: TransportFailure): Promise<RetryOutcome> {
    item.lastError = result.error;
    if (!result.retryable || !this.policy.canRetry(item.attemptCount)) {
      await this.removeFromManifest(item.id);
      await this.failPermanently(item);
      return 'failed';
    }

    item.nextAttemptAt = this.policy.nextAttemptAt(this.clock.now(), item.attemptCount);
    await this.withManifest((items) => {
      const index = items.findIndex((entry) => entry.id === item.id);
      if (index === -1) {
        return false;
      }
      items[index] = item;
      return true;
    });
    this.logger.debug(
      { itemId: item.id, attempts: item.attemptCount, nextAttemptAt: item.nextAttemptAt },
      'Retry failed, rescheduled'
    );
    return 'rescheduled';
  }

  /**
   * One transport call under the send timeout. Thrown errors count as
   * retryable failures.
   */
  private async attempt(item: DeliveryItem): Promise<TransportResult> {
    const transport = item.kind === 'upload' ? this.transports.upload : this.transports.notification;
    try {
      return await withTimeout(this.clock, this.config.sendTimeoutMs, (signal) =>
        transport.send(item, signal)
      );
    } catch (error) {
      return { ok: false, retryable: true, error: errorMessage(error) };
    }
  }

  private async failPermanently(item: DeliveryItem): Promise<void> {
    transition(item, 'failed_permanently');
    this.logger.warn(
      { itemId: item.id, kind: item.kind, attempts: item.attemptCount, error: item.lastError },
      'Delivery failed permanently'
    );
    await this.appendDeadLetter(item);
  }

  private async appendDeadLetter(item: DeliveryItem): Promise<void> {
    await this.queue.run(MANIFEST_QUEUE_KEY, async () => {
      const { items } = parseDeliveryItems(await this.storage.load(DEAD_LETTER_KEY));
      items.push(item);
      await this.storage.save(DEAD_LETTER_KEY, items.slice(-this.config.deadLetterLimit));
    });
  }

  private async removeFromManifest(itemId: string): Promise<void> {
    await this.withManifest((items) => {
      const index = items.findIndex((entry) => entry.id === itemId);
      if (index === -1) {
        return false;
      }
      items.splice(index, 1);
      return true;
    });
  }

  /**
   * Serialized read-modify-write. `mutate` returns whether to save.
   */
  private async withManifest(mutate: (items: DeliveryItem[]) => boolean): Promise<void> {
    await this.queue.run(MANIFEST_QUEUE_KEY, async () => {
      const items = await this.loadManifest();
      if (mutate(items)) {
        await this.storage.save(MANIFEST_KEY, items);
      }
    });
  }

  private async loadManifest(): Promise<DeliveryItem[]> {
    const { items, invalid } = parseDeliveryItems(await this.storage.load(MANIFEST_KEY));
    if (invalid > 0) {
      this.logger.warn({ invalid }, 'Dropped unreadable manifest entries');
    }
    return items;
  }
}

export function createDeliveryPipeline(
  config: DeliveryPipelineConfig,
  deps: DeliveryPipelineDeps
): DeliveryPipeline {
  return new DeliveryPipeline(config, deps);
}
