/**
 * Decision Engine ("Will")
 *
 * Turns each new impression at the decision level into actions. The
 * snapshot it decides on (impression, recalled memories, manifest) is
 * hashed; an unchanged snapshot within `minIntervalMs` is skipped without
 * a model call. Otherwise the model response is streamed through the tag
 * parser and each tag is handed to the motor executor as it completes.
 */

import type { Logger } from '../types/logger.js';
import type { Impression, ImpressionLevel } from '../types/entities.js';
import { createSensation } from '../types/entities.js';
import type { MemoryStore } from '../memory/memory-store.js';
import type { LLMProvider } from '../llm/provider.js';
import type { BodyStream, ExecutionResult, MotorExecutor } from '../motor/motor-executor.js';
import type { EventBus } from '../core/event-bus.js';
import type { HealthMonitor } from '../core/system-health.js';
import type { RetryPolicy } from '../core/retry.js';
import { DEFAULT_RETRY_POLICY, retryWithBackoff } from '../core/retry.js';
import { AsyncQueue } from '../core/message-queue.js';
import { errorMessage } from '../core/errors.js';
import { newCycleId, withCycleContext } from '../core/trace-context.js';
import { StreamParser } from './stream-parser.js';
import { SnapshotThrottle, snapshotHash } from './snapshot.js';
import type { DecisionSnapshot } from './snapshot.js';
import { THOUGHT_PREFIX, buildDecisionPrompt } from './prompt.js';

export interface WillConfig {
  /** Impressions at this level trigger a decision */
  level: ImpressionLevel;
  instructions: string;
  /** Identical snapshots within this window are skipped */
  minIntervalMs: number;
  /** Related memories in the snapshot */
  recallLimit: number;
  /** Outcomes of the Will's own recent actions shown in the prompt */
  recentActions: number;
  temperature?: number | undefined;
  retry: RetryPolicy;
}

export interface WillResources {
  llm: LLMProvider;
  memory: MemoryStore;
}

export interface WillDeps extends WillResources {
  executor: MotorExecutor;
  logger: Logger;
  bus?: EventBus | undefined;
  health?: HealthMonitor | undefined;
}

export type DecisionResult =
  | { status: 'throttled'; hash: string }
  | { status: 'failed'; hash: string; error: string }
  | {
      status: 'decided';
      hash: string;
      intentions: number;
      thoughts: string[];
      /** Resolves when every dispatched call has its outcome */
      outcomes: Promise<ExecutionResult[]>;
    };

const DEFAULT_CONFIG: Omit<WillConfig, 'level' | 'instructions'> = {
  minIntervalMs: 60_000,
  recallLimit: 3,
  recentActions: 5,
  retry: DEFAULT_RETRY_POLICY,
};

const UNIT = 'will';

/**
 * One streamed response: parser callbacks, dispatched calls and thoughts.
 */
class ResponseHandler {
  readonly dispatched: Promise<ExecutionResult | null>[] = [];
  readonly thoughts: string[] = [];
  opened = 0;
  private thought = '';
  private current: BodyStream | null = null;
  private finished = false;
  private readonly parser: StreamParser;
  private readonly logger: Logger;

  constructor(executor: MotorExecutor, logger: Logger) {
    this.logger = logger;
    this.parser = new StreamParser(
      (action) => executor.isKnown(action),
      {
        onText: (text) => {
          this.thought += text;
        },
        onOpen: (action, attributes) => {
          this.flushThought();
          this.opened++;
          this.current = executor.openStream(action, attributes);
        },
        onBody: (_action, chunk) => {
          this.current?.write(chunk);
        },
        onClose: () => {
          if (this.current) this.dispatched.push(this.current.end());
          this.current = null;
        },
        onMalformed: (reason, raw) => {
          logger.warn({ reason, raw: raw.slice(0, 200) }, 'Skipped tag in model output');
        },
        onUnterminated: (action, raw) => {
          logger.warn({ action, raw: raw.slice(0, 200) }, 'Response ended inside a tag, discarded');
          if (this.current) this.dispatched.push(this.current.abort('Tag never closed'));
          this.current = null;
        },
      }
    );
  }

  push(chunk: string): void {
    if (!this.finished) this.parser.push(chunk);
  }

  finish(): void {
    if (this.finished) return;
    this.finished = true;
    this.parser.end();
    this.flushThought();
  }

  /**
   * The response stopped after actions went out. They cannot be taken back,
   * so what was parsed stands and nothing later is read.
   */
  breakOff(error: unknown): void {
    if (this.finished) return;
    this.logger.warn({ error: errorMessage(error), opened: this.opened }, 'Response stream broke after dispatching');
    this.finish();
  }

  private flushThought(): void {
    const text = this.thought.trim();
    this.thought = '';
    if (text.length > 0) this.thoughts.push(text);
  }
}

export class DecisionEngine {
  private readonly config: WillConfig;
  private readonly deps: WillDeps;
  private readonly logger: Logger;
  private readonly throttle: SnapshotThrottle;
  private readonly inbox = new AsyncQueue<Impression>();
  private readonly latest = new Map<ImpressionLevel, Impression>();
  private recent: ExecutionResult[] = [];

  constructor(config: Pick<WillConfig, 'level' | 'instructions'> & Partial<WillConfig>, deps: WillDeps) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'will' });
    this.throttle = new SnapshotThrottle(this.config.minIntervalMs);
  }

  get level(): ImpressionLevel {
    return this.config.level;
  }

  /**
   * Note a new impression. Decision-level impressions queue a decision;
   * others only update the context shown in the prompt.
   */
  notify(impression: Impression): boolean {
    this.latest.set(impression.level, impression);
    if (impression.level !== this.config.level) {
      return false;
    }
    return this.inbox.push(impression);
  }

  /**
   * Unit body: decide on each queued impression until `signal` aborts.
   */
  async run(signal: AbortSignal, resources: WillResources = this.deps): Promise<void> {
    while (!signal.aborted) {
      const impression = await this.inbox.pull({ signal });
      if (impression === null) {
        if (this.inbox.isClosed()) return;
        continue;
      }
      await this.decide(impression, resources, signal);
    }
  }

  close(): void {
    this.inbox.close();
  }

  /**
   * One decision cycle.
   */
  decide(impression: Impression, resources: WillResources = this.deps, signal?: AbortSignal): Promise<DecisionResult> {
    const context = { unit: UNIT, cycleId: newCycleId(UNIT), causeId: impression.id };
    return withCycleContext(context, () => this.doDecide(impression, resources, signal));
  }

  private async doDecide(impression: Impression, resources: WillResources, signal?: AbortSignal): Promise<DecisionResult> {
    const { executor } = this.deps;
    const recalled = await this.recallFor(impression, resources.memory);
    const snapshot: DecisionSnapshot = { impression: impression.text, recalled, manifest: executor.manifest() };
    const hash = snapshotHash(snapshot);

    if (!this.throttle.admit(hash)) {
      this.logger.debug({ impressionId: impression.id, hash }, 'Snapshot unchanged, decision skipped');
      return { status: 'throttled', hash };
    }

    const prompt = buildDecisionPrompt({
      impression,
      context: [...this.latest.values()].filter((i) => i.level !== impression.level),
      recalled,
      recent: this.recent,
      manifest: snapshot.manifest,
    });

    const attempts: ResponseHandler[] = [];
    let handler: ResponseHandler;
    try {
      handler = await retryWithBackoff(
        async (attemptSignal) => {
          const attempt = new ResponseHandler(executor, this.logger);
          attempts.push(attempt);
          try {
            const stream = resources.llm.stream(
              { system: this.config.instructions, prompt, temperature: this.config.temperature },
              attemptSignal
            );
            for await (const chunk of stream) {
              attempt.push(chunk);
            }
          } catch (error) {
            if (attempt.opened === 0) throw error;
            attempt.breakOff(error);
            return attempt;
          }
          attempt.finish();
          return attempt;
        },
        this.config.retry,
        {
          logger: this.logger,
          label: UNIT,
          signal,
          // A retry would dispatch the same actions a second time
          shouldRetry: () => (attempts.at(-1)?.opened ?? 0) === 0,
        }
      );
    } catch (error) {
      const last = attempts.at(-1);
      if (last === undefined || last.opened === 0) {
        const message = errorMessage(error);
        if (!signal?.aborted) {
          this.logger.error({ impressionId: impression.id, error: message }, 'Decision failed, cycle dropped');
          this.deps.health?.recordFailure(UNIT, 'llm', message);
        }
        return { status: 'failed', hash, error: message };
      }
      // The time budget ran out after the first actions went out
      last.breakOff(error);
      handler = last;
    }
    this.deps.health?.recordSuccess(UNIT, 'llm');

    for (const thought of handler.thoughts) {
      await this.publishThought(thought, resources.memory);
    }

    const intentions = handler.opened;
    if (intentions === 0) {
      this.logger.warn({ impressionId: impression.id }, 'Decision produced no intentions');
    } else {
      this.logger.info({ impressionId: impression.id, intentions }, 'Decision dispatched');
    }

    const outcomes = Promise.all(handler.dispatched).then((results) => {
      const done = results.filter((r): r is ExecutionResult => r !== null);
      this.remember(done);
      return done;
    });
    return { status: 'decided', hash, intentions, thoughts: handler.thoughts, outcomes };
  }

  private async recallFor(impression: Impression, memory: MemoryStore): Promise<string[]> {
    if (this.config.recallLimit <= 0) return [];
    try {
      const hits = await memory.recall(impression.text, this.config.recallLimit + 1);
      return hits
        .filter((hit) => hit.impression.id !== impression.id)
        .slice(0, this.config.recallLimit)
        .map((hit) => hit.excerpt);
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Recall failed, deciding without it');
      return [];
    }
  }

  private async publishThought(text: string, memory: MemoryStore): Promise<void> {
    const sensation = createSensation(`${THOUGHT_PREFIX}${text}`, { modality: 'thought', device: UNIT }, { kind: 'thought' });
    this.logger.debug({ text }, 'Thought');
    this.deps.bus?.emit({ type: 'thought', sensation });
    try {
      await memory.insert(sensation);
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Failed to store thought');
    }
  }

  private remember(results: readonly ExecutionResult[]): void {
    if (this.config.recentActions <= 0) return;
    this.recent = [...this.recent, ...results].slice(-this.config.recentActions);
  }
}

export function createDecisionEngine(
  config: Pick<WillConfig, 'level' | 'instructions'> & Partial<WillConfig>,
  deps: WillDeps
): DecisionEngine {
  return new DecisionEngine(config, deps);
}
