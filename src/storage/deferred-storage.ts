import type { Storage } from './storage.js';
import type { Logger } from '../types/index.js';

/**
 * Configuration for DeferredStorage.
 */
export interface DeferredStorageConfig {
  /** Flush interval in ms (default: 30 seconds) */
  flushIntervalMs: number;
}

const DEFAULT_CONFIG: DeferredStorageConfig = {
  flushIntervalMs: 30_000,
};

/**
 * DeferredStorage - write batching over another Storage.
 *
 * The encounter ledger is saved after every detection; this keeps the
 * latest value in memory and writes it at most once per interval.
 *
 * ```
 * const storage = createDeferredStorage(createJSONStorage('data/state'), logger);
 * storage.startAutoFlush();
 * await storage.save('encounters', ledger.snapshot());
 * await storage.shutdown(); // final flush
 * ```
 */
export class DeferredStorage implements Storage {
  private readonly underlying: Storage;
  private readonly logger: Logger;
  private readonly config: DeferredStorageConfig;

  private readonly cache = new Map<string, { data: unknown; dirty: boolean }>();
  private readonly deletedKeys = new Set<string>();
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private flushing: Promise<void> | null = null;

  constructor(underlying: Storage, logger: Logger, config: Partial<DeferredStorageConfig> = {}) {
    this.underlying = underlying;
    this.logger = logger.child({ component: 'deferred-storage' });
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async load(key: string): Promise<unknown> {
    if (this.deletedKeys.has(key)) {
      return null;
    }

    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached.data;
    }

    const data = await this.underlying.load(key);
    if (data !== null) {
      this.cache.set(key, { data, dirty: false });
    }
    return data;
  }

  save(key: string, data: unknown): Promise<void> {
    this.deletedKeys.delete(key);
    this.cache.set(key, { data, dirty: true });
    return Promise.resolve();
  }

  async delete(key: string): Promise<boolean> {
    const existed = this.cache.has(key) || (await this.underlying.exists(key));
    this.cache.delete(key);
    this.deletedKeys.add(key);
    return existed;
  }

  async exists(key: string): Promise<boolean> {
    if (this.deletedKeys.has(key)) {
      return false;
    }
    if (this.cache.has(key)) {
      return true;
    }
    return this.underlying.exists(key);
  }

  startAutoFlush(): void {
    if (this.flushTimer) {
      return;
    }

    this.flushTimer = setInterval(() => {
      this.flush().catch((err: unknown) => {
        this.logger.error({ error: String(err) }, 'Auto-flush failed');
      });
    }, this.config.flushIntervalMs);
    this.flushTimer.unref();

    this.logger.debug({ intervalMs: this.config.flushIntervalMs }, 'Auto-flush started');
  }

  stopAutoFlush(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
  }

  /**
   * Write dirty entries and pending deletes. A call during a running
   * flush waits for it and then flushes again.
   */
  async flush(): Promise<void> {
    while (this.flushing) {
      await this.flushing;
    }
    this.flushing = this.writeDirty();
    try {
      await this.flushing;
    } finally {
      this.flushing = null;
    }
  }

  private async writeDirty(): Promise<void> {
    let written = 0;
    for (const [key, entry] of this.cache) {
      if (!entry.dirty) continue;
      const data = entry.data;
      await this.underlying.save(key, data);
      // A save() during the write leaves the entry dirty
      const current = this.cache.get(key);
      if (current !== undefined && current.data === data) {
        current.dirty = false;
      }
      written++;
    }

    const keysToDelete = [...this.deletedKeys];
    for (const key of keysToDelete) {
      await this.underlying.delete(key);
      this.deletedKeys.delete(key);
    }

    if (written > 0 || keysToDelete.length > 0) {
      this.logger.debug({ written, deleted: keysToDelete.length }, 'Storage flushed');
    }
  }

  getDirtyCount(): number {
    let count = 0;
    for (const entry of this.cache.values()) {
      if (entry.dirty) count++;
    }
    return count + this.deletedKeys.size;
  }

  async shutdown(): Promise<void> {
    this.stopAutoFlush();
    await this.flush();
    this.cache.clear();
    this.logger.debug('Deferred storage shutdown complete');
  }
}

export function createDeferredStorage(
  underlying: Storage,
  logger: Logger,
  config?: Partial<DeferredStorageConfig>
): DeferredStorage {
  return new DeferredStorage(underlying, logger, config);
}
