import type { Clock, ReaderLink } from '../ports/index.js';
import type { Logger } from '../types/index.js';
import { encodeResponseFrame } from './frame-codec.js';

/**
 * Simulated reader configuration.
 */
export interface SimulatedReaderConfig {
  /** Tags the simulator cycles through */
  tagIds: string[];
  /** Reader address echoed in responses */
  address: string;
  /** A tag is "present" for this long, then absent for the same period */
  presenceMs: number;
  /** Fraction of responses with a corrupted checksum (0-1) */
  corruptionRate: number;
}

const DEFAULT_CONFIG: SimulatedReaderConfig = {
  tagIds: ['900263003496836'],
  address: '01',
  presenceMs: 10_000,
  corruptionRate: 0.05,
};

/**
 * ReaderLink that fabricates reader responses.
 *
 * Selected with `reader.port = "simulate"` to exercise the full pipeline
 * on a machine without the RS-485 hardware.
 */
export class SimulatedReaderLink implements ReaderLink {
  private readonly config: SimulatedReaderConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly random: () => number;
  private open_ = false;
  private readonly startedAt: number;

  constructor(
    clock: Clock,
    logger: Logger,
    config: Partial<SimulatedReaderConfig> = {},
    random: () => number = Math.random
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.clock = clock;
    this.logger = logger.child({ component: 'simulated-reader' });
    this.random = random;
    this.startedAt = clock.now();
  }

  open(): Promise<void> {
    this.open_ = true;
    this.logger.info({ tags: this.config.tagIds.length }, 'Simulated reader opened');
    return Promise.resolve();
  }

  request(_command: Buffer, _timeoutMs: number): Promise<string | null> {
    const elapsed = this.clock.now() - this.startedAt;
    const slot = Math.floor(elapsed / this.config.presenceMs);

    // Odd slots: nothing in range
    if (slot % 2 === 1 || this.config.tagIds.length === 0) {
      return Promise.resolve(null);
    }

    const tagId = this.config.tagIds[(slot / 2) % this.config.tagIds.length];
    if (tagId === undefined) {
      return Promise.resolve(null);
    }

    const frame = encodeResponseFrame(`A${this.config.address}D${tagId}`);
    if (this.random() < this.config.corruptionRate) {
      // Break the checksum, keep the framing
      return Promise.resolve(frame.slice(0, -3) + 'ZZ#');
    }
    return Promise.resolve(frame);
  }

  close(): Promise<void> {
    this.open_ = false;
    return Promise.resolve();
  }

  isOpen(): boolean {
    return this.open_;
  }
}
