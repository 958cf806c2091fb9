import type { Clock, ClockTimer } from '../ports/index.js';
import type { Detection, Logger } from '../types/index.js';
import { AggregatorClosedError, errorMessage } from '../core/errors.js';
import { KeyedSerialQueue } from '../core/keyed-queue.js';
import { createTraceContext, withTraceContext } from '../core/trace-context.js';

/**
 * Why a batch was handed to the flush handler.
 */
export type FlushReason = 'debounce' | 'cap' | 'shutdown';

/**
 * Receives one closed batch. Detections are in arrival order.
 */
export type FlushHandler = (
  tagId: string,
  detections: Detection[],
  reason: FlushReason
) => Promise<void>;

export interface BatchAggregatorConfig {
  /** Quiet period after the last detection before a batch flushes */
  batchDelayMs: number;
  /** A batch flushes immediately when it reaches this size */
  maxDetectionsPerBatch: number;
}

/**
 * A batch dropped by discardAll().
 */
export interface DiscardedBatch {
  tagId: string;
  detections: Detection[];
}

interface PendingBatch {
  detections: Detection[];
  timer: ClockTimer | null;
}

/**
 * BatchAggregator - per-tag debounce.
 *
 * Detections of one tag that keep arriving within `batchDelayMs` of each
 * other collapse into one batch. Each add() resets the tag's deadline; the
 * batch flushes once the tag has been quiet for a full window, or as soon
 * as it reaches `maxDetectionsPerBatch`.
 *
 * Taking a batch out of the map happens synchronously in the timer
 * callback, so a detection arriving during a slow flush always starts a
 * new batch. Flushes of one tag run in order through a KeyedSerialQueue.
 */
export class BatchAggregator {
  private readonly config: BatchAggregatorConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly handler: FlushHandler;
  private readonly pending = new Map<string, PendingBatch>();
  private readonly queue = new KeyedSerialQueue();
  private closed = false;

  constructor(config: BatchAggregatorConfig, clock: Clock, handler: FlushHandler, logger: Logger) {
    if (!Number.isFinite(config.batchDelayMs) || config.batchDelayMs <= 0) {
      throw new RangeError(`batchDelayMs must be positive, got ${String(config.batchDelayMs)}`);
    }
    if (!Number.isInteger(config.maxDetectionsPerBatch) || config.maxDetectionsPerBatch < 1) {
      throw new RangeError(
        `maxDetectionsPerBatch must be a positive integer, got ${String(config.maxDetectionsPerBatch)}`
      );
    }
    this.config = config;
    this.clock = clock;
    this.handler = handler;
    this.logger = logger.child({ component: 'batch-aggregator' });
  }

  /**
   * Append a detection to its tag's batch and reset the debounce deadline.
   */
  add(detection: Detection): void {
    if (this.closed) {
      throw new AggregatorClosedError(detection.tagId);
    }

    const { tagId } = detection;
    let batch = this.pending.get(tagId);
    if (!batch) {
      batch = { detections: [], timer: null };
      this.pending.set(tagId, batch);
    }

    batch.detections.push(detection);
    if (batch.timer) {
      this.clock.clearTimer(batch.timer);
      batch.timer = null;
    }

    if (batch.detections.length >= this.config.maxDetectionsPerBatch) {
      this.logger.debug({ tagId, size: batch.detections.length }, 'Batch reached cap');
      this.take(tagId, 'cap');
      return;
    }

    batch.timer = this.clock.setTimer(() => {
      this.take(tagId, 'debounce');
    }, this.config.batchDelayMs);

    this.logger.debug(
      { tagId, size: batch.detections.length, dueAt: batch.timer.dueAt },
      'Detection added to batch'
    );
  }

  /**
   * Flush every pending batch now and wait for all flush handlers.
   */
  async flushAll(reason: FlushReason = 'shutdown'): Promise<void> {
    const tagIds = [...this.pending.keys()];
    if (tagIds.length > 0) {
      this.logger.info({ batches: tagIds.length, reason }, 'Flushing all pending batches');
    }
    for (const tagId of tagIds) {
      this.take(tagId, reason);
    }
    await this.whenIdle();
  }

  /**
   * Cancel every pending batch without flushing. The dropped batches are
   * returned and logged.
   */
  discardAll(): DiscardedBatch[] {
    const discarded: DiscardedBatch[] = [];
    for (const [tagId, batch] of this.pending) {
      if (batch.timer) {
        this.clock.clearTimer(batch.timer);
      }
      discarded.push({ tagId, detections: batch.detections });
      this.logger.warn(
        { tagId, detections: batch.detections.length },
        'Discarding pending batch on shutdown'
      );
    }
    this.pending.clear();
    return discarded;
  }

  /**
   * Stop accepting detections. Pending batches keep their timers.
   */
  close(): void {
    this.closed = true;
  }

  /**
   * Resolve when no flush handler is running or queued.
   */
  whenIdle(): Promise<void> {
    return this.queue.whenIdle();
  }

  /** Tags with an open batch */
  get pendingCount(): number {
    return this.pending.size;
  }

  /** Size of the open batch for a tag (0 when none) */
  pendingSize(tagId: string): number {
    return this.pending.get(tagId)?.detections.length ?? 0;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private take(tagId: string, reason: FlushReason): void {
    const batch = this.pending.get(tagId);
    if (!batch) {
      return;
    }
    this.pending.delete(tagId);
    if (batch.timer) {
      this.clock.clearTimer(batch.timer);
    }

    const detections = batch.detections;
    void this.queue.run(tagId, () =>
      withTraceContext(createTraceContext('batch', { tagId }), async () => {
        this.logger.info({ tagId, detections: detections.length, reason }, 'Flushing batch');
        try {
          await this.handler(tagId, detections, reason);
        } catch (error) {
          this.logger.error({ tagId, error: errorMessage(error) }, 'Batch flush handler failed');
        }
      })
    );
  }
}

export function createBatchAggregator(
  config: BatchAggregatorConfig,
  clock: Clock,
  handler: FlushHandler,
  logger: Logger
): BatchAggregator {
  return new BatchAggregator(config, clock, handler, logger);
}
