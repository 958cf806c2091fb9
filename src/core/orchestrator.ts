import type { CapturePort, Clock, ClockTimer, ReaderLink } from '../ports/index.js';
import type { Logger, TagEvent } from '../types/index.js';
import { createTagEvent } from '../types/index.js';
import type { Deduplicator } from '../pipeline/deduplicator.js';
import type { EncounterLedger } from '../pipeline/encounter-ledger.js';
import type { BatchAggregator } from '../pipeline/batch-aggregator.js';
import type { DeliveryPipeline } from '../delivery/index.js';
import type { Storage } from '../storage/index.js';
import { buildPollCommand, inspectFrame } from '../reader/frame-codec.js';
import { errorMessage } from './errors.js';
import { KeyedSerialQueue } from './keyed-queue.js';

export const ENCOUNTERS_KEY = 'encounters';

export type OrchestratorState = 'idle' | 'polling' | 'backoff' | 'stopping' | 'stopped';

export interface OrchestratorConfig {
  /** Reader bus address (two hex digits) */
  address: string;
  /** Reader output format code */
  format: string;
  pollIntervalMs: number;
  pollTimeoutMs: number;
  /** First delay after a reader error; doubles per consecutive error */
  errorBackoffMs: number;
  maxErrorBackoffMs: number;
  /** Flush pending batches on stop (otherwise they are discarded) */
  drainOnShutdown: boolean;
  /** Bound on waiting for the delivery worker at stop */
  shutdownTimeoutMs: number;
  /** How often the deduplicator is pruned */
  pruneIntervalMs: number;
}

export interface OrchestratorDeps {
  reader: ReaderLink;
  deduplicator: Deduplicator;
  ledger: EncounterLedger;
  aggregator: BatchAggregator;
  capture: CapturePort;
  delivery: DeliveryPipeline;
  clock: Clock;
  logger: Logger;
  /** Where the ledger snapshot is kept (write-batched) */
  ledgerStorage?: (Storage & { flush(): Promise<void> }) | undefined;
}

export interface OrchestratorStats {
  state: OrchestratorState;
  polls: number;
  framesDropped: number;
  duplicates: number;
  detections: number;
  errors: number;
  pendingBatches: number;
}

/**
 * Orchestrator - owns the poll loop and the pipeline lifecycle.
 *
 * One poll per tick: send the poll command, decode the answer, drop
 * duplicates, then hand the tag to capture + aggregation on a per-tag
 * queue so the loop never waits on a camera. Reader failures put the loop
 * into backoff; nothing the reader does stops it.
 */
export class Orchestrator {
  private readonly config: OrchestratorConfig;
  private readonly deps: OrchestratorDeps;
  private readonly logger: Logger;
  private readonly pollCommand: Buffer;
  private readonly captureQueue = new KeyedSerialQueue();

  private state: OrchestratorState = 'idle';
  private running = false;
  private tickTimer: ClockTimer | null = null;
  private currentTick: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private backoffMs: number;
  private lastPruneAt = 0;

  private polls = 0;
  private framesDropped = 0;
  private duplicates = 0;
  private detections = 0;
  private errors = 0;

  constructor(config: OrchestratorConfig, deps: OrchestratorDeps) {
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'orchestrator' });
    // Throws on a bad address/format before anything starts
    this.pollCommand = buildPollCommand(config.address, config.format);
    this.backoffMs = config.errorBackoffMs;
  }

  /**
   * Start polling and the delivery retry worker.
   */
  start(): void {
    if (this.running) {
      this.logger.warn('Orchestrator already running');
      return;
    }
    if (this.state !== 'idle') {
      throw new Error(`Cannot start orchestrator in state ${this.state}`);
    }

    this.running = true;
    this.state = 'polling';
    this.lastPruneAt = this.deps.clock.now();
    this.deps.delivery.start();
    this.scheduleTick(0);
    this.logger.info(
      { command: this.pollCommand.toString('latin1'), pollIntervalMs: this.config.pollIntervalMs },
      'Polling started'
    );
  }

  /**
   * Stop polling, finish in-flight work and release the reader.
   * Safe to call more than once.
   */
  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  getState(): OrchestratorState {
    return this.state;
  }

  getStats(): OrchestratorStats {
    return {
      state: this.state,
      polls: this.polls,
      framesDropped: this.framesDropped,
      duplicates: this.duplicates,
      detections: this.detections,
      errors: this.errors,
      pendingBatches: this.deps.aggregator.pendingCount,
    };
  }

  /**
   * Resolve once every dispatched capture has reached the aggregator.
   */
  whenCapturesIdle(): Promise<void> {
    return this.captureQueue.whenIdle();
  }

  private scheduleTick(delayMs: number): void {
    if (!this.running) return;

    this.tickTimer = this.deps.clock.setTimer(() => {
      this.tickTimer = null;
      this.currentTick = this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    if (!this.running) return;

    let nextDelay = this.config.pollIntervalMs;
    try {
      const { reader } = this.deps;
      if (!reader.isOpen()) {
        await reader.open();
      }

      this.polls++;
      const response = await reader.request(this.pollCommand, this.config.pollTimeoutMs);

      if (this.state === 'backoff') {
        this.logger.info('Reader recovered');
        this.state = 'polling';
      }
      this.backoffMs = this.config.errorBackoffMs;

      if (response !== null) {
        this.handleFrame(response);
      }
    } catch (error) {
      this.errors++;
      nextDelay = this.backoffMs;
      this.backoffMs = Math.min(this.backoffMs * 2, this.config.maxErrorBackoffMs);
      if (this.running) {
        this.state = 'backoff';
      }
      this.logger.error({ error: errorMessage(error), retryInMs: nextDelay }, 'Reader error');
      await this.closeReader();
    }

    this.maybePrune();
    this.scheduleTick(nextDelay);
  }

  private handleFrame(raw: string): void {
    const decoded = inspectFrame(raw);
    if (!decoded.ok) {
      this.framesDropped++;
      this.logger.debug({ reason: decoded.reason, frame: raw.trim() }, 'Frame dropped');
      return;
    }

    const now = this.deps.clock.now();
    const { tagId } = decoded;
    if (this.deps.deduplicator.isDuplicate(tagId, now)) {
      this.duplicates++;
      return;
    }

    const event = createTagEvent(tagId, now, raw);
    this.detections++;
    this.deps.ledger.record(tagId, now);
    this.persistLedger();
    this.logger.info({ tagId }, 'Tag detected');
    this.dispatch(event);
  }

  /**
   * Capture and aggregate off the poll loop, in order per tag.
   */
  private dispatch(event: TagEvent): void {
    void this.captureQueue.run(event.tagId, async () => {
      let artifactPaths: string[] = [];
      try {
        artifactPaths = await this.deps.capture.capture(event.tagId);
      } catch (error) {
        this.logger.error({ tagId: event.tagId, error: errorMessage(error) }, 'Capture threw');
      }

      try {
        this.deps.aggregator.add({
          tagId: event.tagId,
          timestamp: event.detectedAt,
          artifactPaths,
        });
      } catch (error) {
        this.logger.warn({ tagId: event.tagId, error: errorMessage(error) }, 'Detection not batched');
      }
    });
  }

  private persistLedger(): void {
    const storage = this.deps.ledgerStorage;
    if (!storage) return;
    storage.save(ENCOUNTERS_KEY, this.deps.ledger.snapshot()).catch((error: unknown) => {
      this.logger.error({ error: errorMessage(error) }, 'Failed to save encounter ledger');
    });
  }

  private maybePrune(): void {
    const now = this.deps.clock.now();
    if (now - this.lastPruneAt < this.config.pruneIntervalMs) return;
    this.lastPruneAt = now;
    const removed = this.deps.deduplicator.prune(now);
    if (removed > 0) {
      this.logger.trace({ removed }, 'Deduplicator pruned');
    }
  }

  private async closeReader(): Promise<void> {
    try {
      await this.deps.reader.close();
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Failed to close reader');
    }
  }

  private async shutdown(): Promise<void> {
    this.logger.info({ drain: this.config.drainOnShutdown }, 'Stopping');
    this.running = false;
    this.state = 'stopping';

    if (this.tickTimer) {
      this.deps.clock.clearTimer(this.tickTimer);
      this.tickTimer = null;
    }
    if (this.currentTick) {
      await this.currentTick;
    }

    await this.captureQueue.whenIdle();

    const { aggregator } = this.deps;
    aggregator.close();
    if (this.config.drainOnShutdown) {
      await aggregator.flushAll('shutdown');
    } else {
      const discarded = aggregator.discardAll();
      if (discarded.length > 0) {
        this.logger.warn({ batches: discarded.length }, 'Pending batches discarded');
      }
    }

    await this.deps.delivery.stop(this.config.shutdownTimeoutMs);

    const storage = this.deps.ledgerStorage;
    if (storage) {
      try {
        await storage.save(ENCOUNTERS_KEY, this.deps.ledger.snapshot());
        await storage.flush();
      } catch (error) {
        this.logger.error({ error: errorMessage(error) }, 'Failed to flush encounter ledger');
      }
    }

    await this.closeReader();
    this.state = 'stopped';
    this.logger.info({ ...this.getStats() }, 'Stopped');
  }
}

export function createOrchestrator(config: OrchestratorConfig, deps: OrchestratorDeps): Orchestrator {
  return new Orchestrator(config, deps);
}
