/**
 * Motor Executor
 *
 * Runs intentions against the motor registry and guarantees that every
 * MotorCall ends in exactly one Completion or Interruption:
 * - unknown action, missing attribute, motor error, timeout → Interruption(error)
 * - a newer call on the same exclusive resource → Interruption(superseded)
 * - cancelAll() on shutdown → Interruption(cancelled)
 *
 * Calls on unrelated actions run concurrently. Starts are rate limited.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from '../types/logger.js';
import type {
  Completion,
  Intention,
  Interruption,
  InterruptionCause,
  MotorCall,
  Outcome,
} from '../types/entities.js';
import { createIntention } from '../types/entities.js';
import type { MemoryStore } from '../memory/memory-store.js';
import type { EventBus } from '../core/event-bus.js';
import type { Motor, MotorRegistry } from './motor.js';
import { AsyncQueue, RateLimiter } from '../core/message-queue.js';
import { MotorError, TimeoutError, errorMessage } from '../core/errors.js';
import { newCycleId, withCycleContext } from '../core/trace-context.js';

export interface ExecutionResult {
  intention: Intention;
  motorCall: MotorCall;
  outcome: Outcome;
}

/**
 * A call whose body is still being parsed.
 */
export interface BodyStream {
  readonly intentionId: string;
  readonly action: string;
  /** Forward body text (ignored once the call has ended) */
  write(chunk: string): void;
  /** Closing tag parsed; resolves with the call's outcome */
  end(): Promise<ExecutionResult>;
  /**
   * The tag never closed. A call that already started is cancelled;
   * a buffered one never starts (null).
   */
  abort(detail: string): Promise<ExecutionResult | null>;
}

export interface MotorExecutorConfig {
  /** Time budget for motors that declare none */
  defaultTimeoutMs: number;
  /** Call starts per second (0 = unlimited) */
  dispatchPerSecond: number;
}

const DEFAULT_CONFIG: MotorExecutorConfig = {
  defaultTimeoutMs: 30_000,
  dispatchPerSecond: 0,
};

type Resolution = { result: string } | { cause: InterruptionCause; detail: string };

class Deferred<T> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => undefined;

  constructor() {
    this.promise = new Promise<T>((resolve) => {
      this.resolve = resolve;
    });
  }
}

/**
 * Body text for one call: kept whole for the Intention record, and queued
 * chunk by chunk for the motor.
 */
class BodyChannel {
  private readonly queue = new AsyncQueue<string>();
  text = '';

  constructor(initial?: string) {
    if (initial !== undefined) {
      this.write(initial);
      this.close();
    }
  }

  write(chunk: string): void {
    if (this.queue.isClosed() || chunk.length === 0) return;
    this.text += chunk;
    this.queue.push(chunk);
  }

  close(): void {
    this.queue.close();
  }

  isClosed(): boolean {
    return this.queue.isClosed();
  }

  async *chunks(signal: AbortSignal): AsyncIterable<string> {
    for (;;) {
      const chunk = await this.queue.pull({ signal });
      if (chunk === null) return;
      yield chunk;
    }
  }
}

interface ActiveCall {
  readonly intentionId: string;
  readonly action: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly motorCall: MotorCall;
  readonly controller: AbortController;
  readonly channel: BodyChannel;
  readonly done: Deferred<ExecutionResult>;
  exclusive: string | undefined;
  interruption: { cause: InterruptionCause; detail: string } | null;
  intention: Intention | null;
  started: Promise<Intention> | null;
}

export class MotorExecutor {
  private readonly registry: MotorRegistry;
  private readonly memory: MemoryStore;
  private readonly bus: EventBus | undefined;
  private readonly logger: Logger;
  private readonly config: MotorExecutorConfig;
  private readonly limiter: RateLimiter;

  private readonly active = new Set<ActiveCall>();
  private readonly holders = new Map<string, ActiveCall>();

  constructor(
    registry: MotorRegistry,
    memory: MemoryStore,
    logger: Logger,
    options: { bus?: EventBus | undefined; config?: Partial<MotorExecutorConfig> | undefined } = {}
  ) {
    this.registry = registry;
    this.memory = memory;
    this.bus = options.bus;
    this.logger = logger.child({ component: 'motor-executor' });
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.limiter = new RateLimiter(this.config.dispatchPerSecond);
  }

  register(motor: Motor): void {
    this.registry.register(motor);
  }

  manifest(): string {
    return this.registry.manifest();
  }

  isKnown(action: string): boolean {
    return this.registry.has(action);
  }

  /**
   * Run an intention whose body is complete.
   */
  execute(intention: Intention): Promise<ExecutionResult> {
    const channel = new BodyChannel(intention.body);
    const call = this.createCall(intention.id, intention.action, intention.attributes, channel, intention);
    return call.done.promise;
  }

  /**
   * Open a call whose body is still arriving. Motors that accept a streamed
   * body start now; others are buffered and start on end().
   */
  openStream(action: string, attributes: Readonly<Record<string, string>>): BodyStream {
    const intentionId = randomUUID();
    const motor = this.registry.get(action);

    if (!motor?.acceptsBody) {
      let body = '';
      let closed = false;
      return {
        intentionId,
        action,
        write: (chunk) => {
          if (!closed) body += chunk;
        },
        end: () => {
          closed = true;
          return this.execute(createIntention(action, { ...attributes }, body, { id: intentionId }));
        },
        abort: (detail) => {
          closed = true;
          this.logger.debug({ action, detail }, 'Buffered call discarded');
          return Promise.resolve(null);
        },
      };
    }

    const channel = new BodyChannel();
    const call = this.createCall(intentionId, action, attributes, channel);
    return {
      intentionId,
      action,
      write: (chunk) => {
        channel.write(chunk);
      },
      end: () => {
        channel.close();
        void this.ensureStarted(call);
        return call.done.promise;
      },
      abort: (detail) => {
        channel.close();
        this.interrupt(call, 'cancelled', detail);
        return call.done.promise;
      },
    };
  }

  /**
   * Interrupt every call in flight and wait for the outcomes to be recorded.
   */
  async cancelAll(cause: InterruptionCause = 'cancelled', detail = 'Shutdown'): Promise<ExecutionResult[]> {
    const calls = [...this.active];
    for (const call of calls) {
      this.interrupt(call, cause, detail);
    }
    return Promise.all(calls.map((call) => call.done.promise));
  }

  /**
   * Wait for every call in flight to finish on its own.
   */
  async drain(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.all([...this.active].map((call) => call.done.promise));
    }
  }

  inFlight(): number {
    return this.active.size;
  }

  private createCall(
    intentionId: string,
    action: string,
    attributes: Readonly<Record<string, string>>,
    channel: BodyChannel,
    intention: Intention | null = null
  ): ActiveCall {
    const call: ActiveCall = {
      intentionId,
      action,
      attributes,
      motorCall: {
        type: 'motor_call',
        id: randomUUID(),
        intentionId,
        action,
        startedAt: new Date(),
      },
      controller: new AbortController(),
      channel,
      done: new Deferred<ExecutionResult>(),
      exclusive: undefined,
      interruption: null,
      intention,
      started: null,
    };
    this.active.add(call);

    const context = { unit: 'motor', cycleId: newCycleId('motor'), causeId: intentionId };
    void withCycleContext(context, () => this.run(call)).then(
      (result) => {
        call.done.resolve(result);
      },
      (error: unknown) => {
        // run() records its own failures; reaching this means recording itself broke
        this.logger.error({ action, intentionId, error: errorMessage(error) }, 'Motor call bookkeeping failed');
        call.done.resolve({
          intention: call.intention ?? createIntention(action, { ...attributes }, channel.text, { id: intentionId }),
          motorCall: call.motorCall,
          outcome: this.buildOutcome(call, { cause: 'error', detail: errorMessage(error) }),
        });
      }
    );
    return call;
  }

  private async run(call: ActiveCall): Promise<ExecutionResult> {
    const motor = this.registry.get(call.action);
    if (!motor) {
      return this.finish(call, { cause: 'error', detail: `Unknown action "${call.action}"` });
    }

    const missing = motor.attributes.required.filter((name) => call.attributes[name] === undefined);
    if (missing.length > 0) {
      return this.finish(call, { cause: 'error', detail: `Missing required attribute(s): ${missing.join(', ')}` });
    }

    try {
      await this.limiter.acquire(call.controller.signal);
    } catch {
      return this.finish(call, call.interruption ?? { cause: 'cancelled', detail: 'Aborted before start' });
    }

    if (motor.exclusive !== undefined) {
      const previous = this.holders.get(motor.exclusive);
      this.holders.set(motor.exclusive, call);
      call.exclusive = motor.exclusive;
      if (previous) {
        this.interrupt(previous, 'superseded', `Superseded by intention ${call.intentionId}`);
        await previous.done.promise;
      }
    }

    if (call.interruption) {
      return this.finish(call, call.interruption);
    }

    if (call.channel.isClosed()) {
      await this.ensureStarted(call);
      // A newer call may have superseded this one while the start was recorded
      if (call.interruption) {
        return this.finish(call, call.interruption);
      }
    }

    const timeoutMs = motor.timeoutMs ?? this.config.defaultTimeoutMs;
    const timer = setTimeout(() => {
      this.interrupt(call, 'error', new TimeoutError(timeoutMs, `Motor ${call.action}`).message);
    }, timeoutMs);

    const signal = call.controller.signal;
    let onAbort: (() => void) | undefined;
    const aborted = new Promise<never>((_, reject) => {
      onAbort = () => {
        reject(signal.reason instanceof Error ? signal.reason : new Error('Aborted'));
      };
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
    });

    const intention = createIntention(call.action, { ...call.attributes }, call.channel.text, { id: call.intentionId });
    const work = motor.perform({
      intention,
      body: call.channel.chunks(signal),
      signal,
      logger: this.logger.child({ motor: motor.name }),
    });
    // After an interruption wins the race the motor may still settle; its result no longer counts
    void work.catch(() => undefined);

    try {
      const result = await Promise.race([work, aborted]);
      return await this.finish(call, { result });
    } catch (error) {
      return await this.finish(call, call.interruption ?? { cause: 'error', detail: errorMessage(error) });
    } finally {
      clearTimeout(timer);
      if (onAbort) signal.removeEventListener('abort', onAbort);
    }
  }

  private interrupt(call: ActiveCall, cause: InterruptionCause, detail: string): void {
    if (call.interruption || !this.active.has(call)) {
      return;
    }
    call.interruption = { cause, detail };
    call.channel.close();
    call.controller.abort(new MotorError(call.action, detail));
  }

  /**
   * Record the Intention (with the body received so far) and the MotorCall.
   */
  private ensureStarted(call: ActiveCall): Promise<Intention> {
    call.started ??= this.recordStart(call);
    return call.started;
  }

  private async recordStart(call: ActiveCall): Promise<Intention> {
    const intention =
      call.intention ?? createIntention(call.action, { ...call.attributes }, call.channel.text, { id: call.intentionId });
    call.intention = intention;

    await this.record('start', async () => {
      await this.memory.insert(intention);
      await this.memory.insert(call.motorCall);
      await this.memory.link(call.motorCall.id, 'INVOKES', intention.id);
    });
    this.bus?.emit({ type: 'intention', intention });
    this.logger.debug(
      { action: call.action, intentionId: intention.id, motorCallId: call.motorCall.id },
      'Motor call started'
    );
    return intention;
  }

  private async finish(call: ActiveCall, resolution: Resolution): Promise<ExecutionResult> {
    this.active.delete(call);
    if (call.exclusive !== undefined && this.holders.get(call.exclusive) === call) {
      this.holders.delete(call.exclusive);
    }
    call.channel.close();

    const intention = await this.ensureStarted(call);
    const outcome = this.buildOutcome(call, resolution);

    await this.record('outcome', async () => {
      await this.memory.insert(outcome);
      await this.memory.link(outcome.id, 'RESOLVES', call.motorCall.id);
    });

    if (outcome.type === 'completion') {
      this.logger.info({ action: call.action, motorCallId: call.motorCall.id, result: outcome.result }, 'Motor call completed');
    } else {
      const fields = { action: call.action, motorCallId: call.motorCall.id, cause: outcome.cause, detail: outcome.detail };
      if (outcome.cause === 'error') {
        this.logger.warn(fields, 'Motor call interrupted');
      } else {
        this.logger.info(fields, 'Motor call interrupted');
      }
    }
    this.bus?.emit({ type: 'outcome', motorCall: call.motorCall, outcome });

    return { intention, motorCall: call.motorCall, outcome };
  }

  private buildOutcome(call: ActiveCall, resolution: Resolution): Outcome {
    if ('result' in resolution) {
      const completion: Completion = {
        type: 'completion',
        id: randomUUID(),
        motorCallId: call.motorCall.id,
        timestamp: new Date(),
        result: resolution.result,
      };
      return completion;
    }
    const interruption: Interruption = {
      type: 'interruption',
      id: randomUUID(),
      motorCallId: call.motorCall.id,
      timestamp: new Date(),
      cause: resolution.cause,
      detail: resolution.detail,
    };
    return interruption;
  }

  /**
   * Memory writes for a call. A failure is logged; the call's outcome still stands.
   */
  private async record(stage: 'start' | 'outcome', write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      this.logger.error({ stage, error: errorMessage(error) }, 'Failed to record motor call');
    }
  }
}

export function createMotorExecutor(
  registry: MotorRegistry,
  memory: MemoryStore,
  logger: Logger,
  options?: { bus?: EventBus | undefined; config?: Partial<MotorExecutorConfig> | undefined }
): MotorExecutor {
  return new MotorExecutor(registry, memory, logger, options);
}
