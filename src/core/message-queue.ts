/**
 * Message passing between units.
 *
 * Units never share mutable state; they hand each other items through
 * these queues. FIFO within one queue, no ordering across queues.
 */

/**
 * Unbounded FIFO queue with an awaitable `pull()`.
 *
 * `pull()` resolves with the next item, or `null` once the queue is closed
 * and drained, or when the given signal aborts / the wait times out.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private waiters: ((item: T | null) => void)[] = [];
  private closed = false;

  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  /**
   * Next item without waiting.
   */
  tryPull(): T | null {
    return this.items.shift() ?? null;
  }

  pull(options: { signal?: AbortSignal | undefined; timeoutMs?: number | undefined } = {}): Promise<T | null> {
    const ready = this.items.shift();
    if (ready !== undefined) {
      return Promise.resolve(ready);
    }
    if (this.closed || options.signal?.aborted) {
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const { signal, timeoutMs } = options;

      const settle = (item: T | null): void => {
        this.waiters = this.waiters.filter((w) => w !== settle);
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(item);
      };
      const onAbort = (): void => {
        settle(null);
      };

      this.waiters.push(settle);
      signal?.addEventListener('abort', onAbort, { once: true });
      if (timeoutMs !== undefined && Number.isFinite(timeoutMs)) {
        timer = setTimeout(() => {
          settle(null);
        }, Math.max(0, timeoutMs));
      }
    });
  }

  /**
   * Stop accepting items; pending waiters get `null`. Queued items can still be pulled.
   */
  close(): void {
    this.closed = true;
    for (const waiter of [...this.waiters]) {
      waiter(null);
    }
    this.waiters = [];
  }

  isClosed(): boolean {
    return this.closed;
  }

  size(): number {
    return this.items.length;
  }
}

/**
 * Token-bucket rate limiter.
 *
 * `acquire()` waits until a token is available. Tokens refill continuously
 * at `perSecond`, up to `burst`.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly perSecond: number;
  private readonly burst: number;

  constructor(perSecond: number, burst = Math.max(1, Math.ceil(perSecond))) {
    this.perSecond = perSecond;
    this.burst = burst;
    this.tokens = burst;
    this.lastRefill = Date.now();
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    if (!Number.isFinite(this.perSecond) || this.perSecond <= 0) {
      return;
    }
    for (;;) {
      if (signal?.aborted) {
        throw signal.reason instanceof Error ? signal.reason : new Error('Rate limiter wait aborted');
      }
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }
      const waitMs = Math.ceil(((1 - this.tokens) / this.perSecond) * 1000);
      await new Promise<void>((resolve, reject) => {
        const timer = setTimeout(() => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        }, waitMs);
        const onAbort = (): void => {
          clearTimeout(timer);
          reject(signal?.reason instanceof Error ? signal.reason : new Error('Rate limiter wait aborted'));
        };
        signal?.addEventListener('abort', onAbort, { once: true });
      });
    }
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.burst, this.tokens + elapsed * this.perSecond);
    this.lastRefill = now;
  }
}
