import { describe, it, expect } from 'vitest';
import { AsyncQueue, RateLimiter } from '../../../src/core/message-queue.js';

describe('AsyncQueue', () => {
  it('hands items out in arrival order', async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);

    expect(await queue.pull()).toBe(1);
    expect(queue.tryPull()).toBe(2);
    expect(queue.tryPull()).toBeNull();
  });

  it('wakes a waiting puller', async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.pull();
    queue.push('late');

    expect(await pending).toBe('late');
    expect(queue.size()).toBe(0);
  });

  it('returns null on timeout and on abort', async () => {
    const queue = new AsyncQueue<string>();
    expect(await queue.pull({ timeoutMs: 5 })).toBeNull();

    const controller = new AbortController();
    const pending = queue.pull({ signal: controller.signal });
    controller.abort();
    expect(await pending).toBeNull();

    queue.push('kept');
    expect(await queue.pull()).toBe('kept');
  });

  it('drains queued items after close and then returns null', async () => {
    const queue = new AsyncQueue<string>();
    queue.push('a');
    const waiting = new AsyncQueue<string>();
    const blocked = waiting.pull();

    queue.close();
    waiting.close();

    expect(queue.push('b')).toBe(false);
    expect(await queue.pull()).toBe('a');
    expect(await queue.pull()).toBeNull();
    expect(await blocked).toBeNull();
  });
});

describe('RateLimiter', () => {
  it('lets a burst through and then spaces calls out', async () => {
    const limiter = new RateLimiter(50, 2);
    const start = Date.now();

    await limiter.acquire();
    await limiter.acquire();
    expect(Date.now() - start).toBeLessThan(15);

    await limiter.acquire();
    expect(Date.now() - start).toBeGreaterThanOrEqual(15);
  });

  it('never waits when unlimited', async () => {
    const limiter = new RateLimiter(0);
    for (let i = 0; i < 100; i++) {
      await limiter.acquire();
    }
  });

  it('rejects a wait when the signal aborts', async () => {
    const limiter = new RateLimiter(1, 1);
    await limiter.acquire();
    const controller = new AbortController();
    const waiting = limiter.acquire(controller.signal);
    controller.abort(new Error('cancelled'));

    await expect(waiting).rejects.toThrow('cancelled');
  });
});
