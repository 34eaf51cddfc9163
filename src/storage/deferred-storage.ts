import type { Storage } from './storage.js';
import type { Logger } from '../types/logger.js';
import { errorMessage } from '../core/errors.js';

export interface DeferredStorageConfig {
  /** Flush interval in ms (default: 5 seconds) */
  flushIntervalMs: number;
  /** Called when a flush fails; dirty entries stay dirty and are retried next flush */
  onFlushError?: ((error: unknown) => void) | undefined;
  /** Called after a flush that wrote something */
  onFlushSuccess?: (() => void) | undefined;
}

const DEFAULT_CONFIG: DeferredStorageConfig = {
  flushIntervalMs: 5_000,
};

/**
 * DeferredStorage - wraps any Storage with write batching.
 *
 * save() only updates an in-memory cache; dirty keys are written to the
 * underlying storage on the flush timer and on shutdown. Units therefore
 * never wait on disk for memory writes, and consecutive writes to one key
 * collapse into a single file write.
 */
export class DeferredStorage implements Storage {
  private readonly underlying: Storage;
  private readonly logger: Logger;
  private readonly config: DeferredStorageConfig;

  private cache = new Map<string, { data: unknown; dirty: boolean }>();
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private flushing: Promise<void> | null = null;

  constructor(underlying: Storage, logger: Logger, config: Partial<DeferredStorageConfig> = {}) {
    this.underlying = underlying;
    this.logger = logger.child({ component: 'deferred-storage' });
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async load(key: string): Promise<unknown> {
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
    this.cache.set(key, { data, dirty: true });
    return Promise.resolve();
  }

  startAutoFlush(): void {
    if (this.flushTimer) {
      return;
    }
    this.flushTimer = setInterval(() => {
      void this.flush().catch((error: unknown) => {
        this.logger.error({ error: errorMessage(error) }, 'Auto-flush failed');
      });
    }, this.config.flushIntervalMs);
    this.flushTimer.unref();
  }

  stopAutoFlush(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
  }

  /**
   * Write dirty entries to the underlying storage.
   * Concurrent callers share the flush already in progress.
   */
  flush(): Promise<void> {
    if (this.flushing) {
      return this.flushing;
    }
    this.flushing = this.doFlush().finally(() => {
      this.flushing = null;
    });
    return this.flushing;
  }

  private async doFlush(): Promise<void> {
    const dirty: { key: string; data: unknown }[] = [];
    for (const [key, entry] of this.cache) {
      if (entry.dirty) {
        dirty.push({ key, data: entry.data });
      }
    }
    if (dirty.length === 0) {
      return;
    }

    try {
      for (const { key, data } of dirty) {
        await this.underlying.save(key, data);
        const entry = this.cache.get(key);
        // A save() during the write re-dirtied it with newer data
        if (entry && entry.data === data) {
          entry.dirty = false;
        }
      }
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Storage flush failed');
      this.config.onFlushError?.(error);
      throw error;
    }

    this.logger.debug({ written: dirty.map((e) => e.key) }, 'Storage flushed');
    this.config.onFlushSuccess?.();
  }

  getDirtyCount(): number {
    let count = 0;
    for (const entry of this.cache.values()) {
      if (entry.dirty) count++;
    }
    return count;
  }

  /**
   * Stop the timer and write everything pending.
   */
  async shutdown(): Promise<void> {
    this.stopAutoFlush();
    await this.flush();
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
