/**
 * Supervisor
 *
 * Owns every scheduled unit (distillers, the Will, ingress adapters). Each
 * unit runs as its own async task with its own AbortSignal and its own
 * resource handles, built fresh on every (re)start. A unit that throws, or
 * returns while the supervisor is not stopping, is restarted after an
 * exponential backoff; siblings never notice.
 *
 * All units share Node's event loop, so isolation is about handles and
 * failure boundaries, not threads.
 */

import type { Logger } from '../types/logger.js';
import type { LifecycleEventKind } from '../types/entities.js';
import { createLifecycle } from '../types/entities.js';
import type { MemoryStore } from '../memory/memory-store.js';
import type { EventBus } from './event-bus.js';
import { backoffDelay, sleep } from './retry.js';
import { errorMessage } from './errors.js';

export interface UnitContext<R> {
  signal: AbortSignal;
  /** Handles built for this run by the unit's `resources()` factory */
  resources: R;
  /** Restarts so far (0 on first start) */
  restarts: number;
  logger: Logger;
}

export interface Unit<R = undefined> {
  name: string;
  /** Build per-run handles (LLM client, memory handle). Called on every (re)start. */
  resources: () => R;
  /** Resolves when `signal` aborts; returning earlier counts as a crash */
  run(context: UnitContext<R>): Promise<void>;
}

export type UnitState = 'pending' | 'running' | 'backoff' | 'stopped' | 'terminated';

export interface UnitStatus {
  name: string;
  state: UnitState;
  restarts: number;
  lastError: string | null;
}

export interface SupervisorConfig {
  /** First restart delay; doubles with every further restart */
  restartBackoffMs: number;
  maxRestartBackoffMs: number;
  /** How long shutdown waits for units before abandoning them */
  shutdownTimeoutMs: number;
}

const DEFAULT_CONFIG: SupervisorConfig = {
  restartBackoffMs: 1_000,
  maxRestartBackoffMs: 30_000,
  shutdownTimeoutMs: 5_000,
};

interface ManagedUnit {
  name: string;
  launch: (signal: AbortSignal, restarts: number) => Promise<void>;
  state: UnitState;
  restarts: number;
  lastError: string | null;
  controller: AbortController;
  task: Promise<void> | null;
  settled: boolean;
}

export interface SupervisorDeps {
  logger: Logger;
  /** Where Lifecycle records are stored */
  memory?: MemoryStore | undefined;
  bus?: EventBus | undefined;
}

export class Supervisor {
  private readonly units = new Map<string, ManagedUnit>();
  private readonly config: SupervisorConfig;
  private readonly logger: Logger;
  private readonly deps: SupervisorDeps;
  private readonly stopController = new AbortController();
  private started = false;
  private stopping = false;

  constructor(deps: SupervisorDeps, config: Partial<SupervisorConfig> = {}) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'supervisor' });
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Add a unit. Units registered after start() start immediately.
   */
  register<R>(unit: Unit<R>): void {
    if (this.units.has(unit.name)) {
      throw new Error(`Unit "${unit.name}" is already registered`);
    }
    if (this.stopping) {
      throw new Error(`Cannot register "${unit.name}" during shutdown`);
    }

    const unitLogger = this.deps.logger.child({ unit: unit.name });
    const managed: ManagedUnit = {
      name: unit.name,
      launch: (signal, restarts) =>
        unit.run({ signal, resources: unit.resources(), restarts, logger: unitLogger }),
      state: 'pending',
      restarts: 0,
      lastError: null,
      controller: new AbortController(),
      task: null,
      settled: false,
    };
    this.units.set(unit.name, managed);

    if (this.started) {
      this.launch(managed);
    }
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    for (const managed of this.units.values()) {
      this.launch(managed);
    }
    this.logger.info({ units: [...this.units.keys()] }, 'Supervisor started');
  }

  status(): UnitStatus[] {
    return [...this.units.values()].map(({ name, state, restarts, lastError }) => ({
      name,
      state,
      restarts,
      lastError,
    }));
  }

  /**
   * Abort every unit and wait up to `shutdownTimeoutMs`. Units that stop in
   * time are recorded `stopped`; the rest are abandoned as `terminated`.
   */
  async shutdown(): Promise<UnitStatus[]> {
    if (this.stopping) return this.status();
    this.stopping = true;
    this.stopController.abort();

    const running = [...this.units.values()].filter((u) => u.task !== null);
    for (const managed of running) {
      managed.controller.abort();
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, this.config.shutdownTimeoutMs);
    });
    await Promise.race([Promise.all(running.map((u) => u.task)), timeout]);
    if (timer) clearTimeout(timer);

    for (const managed of running) {
      if (managed.settled) {
        managed.state = 'stopped';
        await this.record(managed.name, 'stopped');
      } else {
        managed.state = 'terminated';
        this.logger.warn({ unit: managed.name }, 'Unit did not stop in time, abandoned');
        await this.record(managed.name, 'terminated', `No stop within ${String(this.config.shutdownTimeoutMs)}ms`);
      }
    }

    this.logger.info('Supervisor shutdown complete');
    return this.status();
  }

  private launch(managed: ManagedUnit): void {
    managed.task = this.supervise(managed).finally(() => {
      managed.settled = true;
    });
  }

  private async supervise(managed: ManagedUnit): Promise<void> {
    await this.record(managed.name, 'started');

    while (!this.stopping) {
      managed.controller = new AbortController();
      managed.state = 'running';
      let failure: string;
      try {
        await managed.launch(managed.controller.signal, managed.restarts);
        if (this.stopping) break;
        failure = 'Unit returned while still scheduled';
      } catch (error) {
        if (this.stopping) break;
        failure = errorMessage(error);
      }

      const delayMs = backoffDelay(
        { baseDelayMs: this.config.restartBackoffMs, maxDelayMs: this.config.maxRestartBackoffMs },
        managed.restarts
      );
      managed.restarts++;
      managed.lastError = failure;
      managed.state = 'backoff';
      this.logger.error(
        { unit: managed.name, restarts: managed.restarts, delayMs, error: failure },
        'Unit crashed, restarting after backoff'
      );
      await this.record(managed.name, 'crashed', failure);

      try {
        await sleep(delayMs, this.stopController.signal);
      } catch {
        break;
      }
      if (this.stopping) break;
      await this.record(managed.name, 'restarted', `Restart ${String(managed.restarts)}`);
    }
  }

  private async record(unit: string, event: LifecycleEventKind, detail?: string): Promise<void> {
    const lifecycle = createLifecycle(unit, event, detail);
    this.logger.debug({ unit, event, detail }, 'Lifecycle');
    this.deps.bus?.emit({ type: 'lifecycle', lifecycle });
    try {
      await this.deps.memory?.insert(lifecycle);
    } catch (error) {
      this.logger.error({ unit, event, error: errorMessage(error) }, 'Failed to record lifecycle');
    }
  }
}

export function createSupervisor(deps: SupervisorDeps, config?: Partial<SupervisorConfig>): Supervisor {
  return new Supervisor(deps, config);
}
