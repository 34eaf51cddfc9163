/**
 * Test factories and in-process stand-ins.
 */

import { vi } from 'vitest';
import type { Logger } from '../../src/types/logger.js';
import type { Storage } from '../../src/storage/storage.js';
import type { Durability } from '../../src/memory/memory-store.js';
import { JsonMemoryStore } from '../../src/memory/json-memory-store.js';
import type { HealthMonitor } from '../../src/core/system-health.js';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

export interface MockLogger extends Logger {
  calls: Record<LogLevel, unknown[][]>;
  /** Messages logged at `level` (the string argument of each call) */
  messages(level: LogLevel): string[];
  reset(): void;
}

/**
 * Create a mock logger that captures all log calls. Children share the
 * parent's capture.
 */
export function createMockLogger(): MockLogger {
  const calls: Record<LogLevel, unknown[][]> = {
    trace: [],
    debug: [],
    info: [],
    warn: [],
    error: [],
    fatal: [],
  };

  const capture = (level: LogLevel) =>
    vi.fn((...args: unknown[]) => {
      calls[level].push(args);
    });

  const logger: MockLogger = {
    trace: capture('trace'),
    debug: capture('debug'),
    info: capture('info'),
    warn: capture('warn'),
    error: capture('error'),
    fatal: capture('fatal'),
    child: () => logger,
    calls,
    messages: (level) =>
      calls[level].map((args) => args.find((arg): arg is string => typeof arg === 'string') ?? ''),
    reset: () => {
      for (const level of LOG_LEVELS) {
        calls[level] = [];
      }
    },
  };

  return logger;
}

/**
 * Storage kept in a Map. `failSaves` makes every save reject.
 */
export class InMemoryStorage implements Storage {
  readonly data = new Map<string, unknown>();
  failSaves = false;
  saves = 0;

  load(key: string): Promise<unknown> {
    return Promise.resolve(this.data.has(key) ? structuredClone(this.data.get(key)) : null);
  }

  save(key: string, data: unknown): Promise<void> {
    if (this.failSaves) {
      return Promise.reject(new Error('disk full'));
    }
    this.saves++;
    this.data.set(key, structuredClone(data));
    return Promise.resolve();
  }
}

export interface TestMemory {
  memory: JsonMemoryStore;
  storage: InMemoryStorage;
  logger: MockLogger;
}

export function createTestMemory(
  options: { durability?: Durability; storage?: InMemoryStorage; health?: HealthMonitor; logger?: MockLogger } = {}
): TestMemory {
  const storage = options.storage ?? new InMemoryStorage();
  const logger = options.logger ?? createMockLogger();
  const memory = new JsonMemoryStore(logger, {
    storage,
    durability: options.durability ?? 'best-effort',
    unit: 'test',
    health: options.health,
  });
  return { memory, storage, logger };
}

/**
 * Wait until `predicate` holds, polling on the event loop.
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error('waitFor timed out');
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
