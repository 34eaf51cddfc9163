import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DeferredStorage } from '../../../src/storage/deferred-storage.js';
import { InMemoryStorage, createMockLogger } from '../../helpers/factories.js';

describe('DeferredStorage', () => {
  let underlying: InMemoryStorage;
  let storage: DeferredStorage;
  const onFlushError = vi.fn();
  const onFlushSuccess = vi.fn();

  beforeEach(() => {
    underlying = new InMemoryStorage();
    onFlushError.mockClear();
    onFlushSuccess.mockClear();
    storage = new DeferredStorage(underlying, createMockLogger(), {
      flushIntervalMs: 10,
      onFlushError,
      onFlushSuccess,
    });
  });

  afterEach(() => {
    storage.stopAutoFlush();
  });

  describe('save and load', () => {
    it('keeps saves in memory until flushed', async () => {
      await storage.save('entities-sensation', { version: 1 });

      expect(underlying.saves).toBe(0);
      expect(await storage.load('entities-sensation')).toEqual({ version: 1 });
      expect(storage.getDirtyCount()).toBe(1);
    });

    it('reads through to the underlying storage once', async () => {
      underlying.data.set('edges', { version: 1, edges: [] });
      const load = vi.spyOn(underlying, 'load');

      expect(await storage.load('edges')).toEqual({ version: 1, edges: [] });
      expect(await storage.load('edges')).toEqual({ version: 1, edges: [] });
      expect(load).toHaveBeenCalledTimes(1);
    });

    it('returns null for a missing key', async () => {
      expect(await storage.load('nothing')).toBeNull();
    });
  });

  describe('flush', () => {
    it('collapses repeated saves of one key into one write', async () => {
      await storage.save('edges', { n: 1 });
      await storage.save('edges', { n: 2 });
      await storage.flush();

      expect(underlying.saves).toBe(1);
      expect(underlying.data.get('edges')).toEqual({ n: 2 });
      expect(storage.getDirtyCount()).toBe(0);
      expect(onFlushSuccess).toHaveBeenCalledTimes(1);
    });

    it('does nothing when nothing is dirty', async () => {
      await storage.flush();

      expect(underlying.saves).toBe(0);
      expect(onFlushSuccess).not.toHaveBeenCalled();
    });

    it('keeps entries dirty and reports when a write fails', async () => {
      await storage.save('edges', { n: 1 });
      underlying.failSaves = true;

      await expect(storage.flush()).rejects.toThrow('disk full');
      expect(onFlushError).toHaveBeenCalledTimes(1);
      expect(storage.getDirtyCount()).toBe(1);

      underlying.failSaves = false;
      await storage.flush();
      expect(underlying.data.get('edges')).toEqual({ n: 1 });
    });

    it('flushes on the timer once auto-flush starts', async () => {
      await storage.save('edges', { n: 1 });
      storage.startAutoFlush();

      await vi.waitFor(() => {
        expect(underlying.data.get('edges')).toEqual({ n: 1 });
      });
    });

    it('writes everything pending on shutdown', async () => {
      await storage.save('a', 1);
      await storage.save('b', 2);

      await storage.shutdown();

      expect([...underlying.data.entries()]).toEqual([
        ['a', 1],
        ['b', 2],
      ]);
    });
  });
});
