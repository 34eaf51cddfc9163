/**
 * Distiller ("Wit")
 *
 * Buffers experiences (sensations, lower-level impressions) into a window
 * and compresses each window into one impression at its configured level.
 * The window closes on whichever comes first: `batchSize` items, or
 * `quiescenceMs` since the last distillation while something is buffered.
 *
 * Exactly one distillation runs at a time and items are taken in arrival
 * order. A window whose model call keeps failing is dropped, not retried
 * forever and not re-queued.
 */

import type { Logger } from '../types/logger.js';
import type { Experience, Impression, ImpressionLevel } from '../types/entities.js';
import { createImpression, createSensation } from '../types/entities.js';
import type { MemoryStore, RecallHit } from '../memory/memory-store.js';
import type { LLMProvider } from '../llm/provider.js';
import { collectText } from '../llm/provider.js';
import type { EventBus } from '../core/event-bus.js';
import type { HealthMonitor } from '../core/system-health.js';
import type { RetryPolicy } from '../core/retry.js';
import { DEFAULT_RETRY_POLICY, retryWithBackoff } from '../core/retry.js';
import { AsyncQueue } from '../core/message-queue.js';
import { LLMError, StoreError, errorMessage } from '../core/errors.js';
import { newCycleId, withCycleContext } from '../core/trace-context.js';
import { buildDistillationPrompt } from './prompt.js';

export interface DistillerConfig {
  name: string;
  level: ImpressionLevel;
  /** Fixed instruction text (system prompt) */
  instructions: string;
  /** Items that close a window */
  batchSize: number;
  /** Idle time after the last distillation that closes a non-empty window */
  quiescenceMs: number;
  /** Replaces the default prompt layout; see TEMPLATE_FIELDS */
  promptTemplate?: string | undefined;
  /** Fold related prior impressions into the prompt */
  recall?: { limit: number } | undefined;
  /** Distiller that also receives each produced impression (may be this one) */
  feedback?: string | undefined;
  temperature?: number | undefined;
  retry: RetryPolicy;
}

/**
 * Per-run handles. The supervisor builds fresh ones on every restart.
 */
export interface DistillerResources {
  llm: LLMProvider;
  memory: MemoryStore;
}

export interface DistillerDeps extends DistillerResources {
  logger: Logger;
  bus?: EventBus | undefined;
  health?: HealthMonitor | undefined;
  /** Hand an impression to another distiller; false when there is no such target */
  route?: ((target: string, item: Experience) => boolean) | undefined;
  /** Called for every persisted impression (the container forwards decision-level ones to the Will) */
  onImpression?: ((impression: Impression) => void) | undefined;
}

const DEFAULT_CONFIG: Omit<DistillerConfig, 'name' | 'level' | 'instructions'> = {
  batchSize: 1,
  quiescenceMs: 5_000,
  retry: DEFAULT_RETRY_POLICY,
};

export class Distiller {
  readonly name: string;
  readonly level: ImpressionLevel;

  private readonly config: DistillerConfig;
  private readonly deps: DistillerDeps;
  private readonly logger: Logger;
  private readonly inbox = new AsyncQueue<Experience>();

  private window: Experience[] = [];
  private lastDistillAt = Date.now();
  private serial: Promise<void> = Promise.resolve();

  constructor(
    config: Pick<DistillerConfig, 'name' | 'level' | 'instructions'> & Partial<DistillerConfig>,
    deps: DistillerDeps
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.name = config.name;
    this.level = config.level;
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'distiller', unit: config.name });
  }

  /**
   * Queue an item for the next window.
   * @returns false once the distiller is closed
   */
  enqueue(item: Experience): boolean {
    return this.inbox.push(item);
  }

  pending(): number {
    return this.inbox.size() + this.window.length;
  }

  /**
   * Unit body: pull items and distill windows until `signal` aborts.
   */
  async run(signal: AbortSignal, resources: DistillerResources = this.deps): Promise<void> {
    this.lastDistillAt = Date.now();
    this.logger.debug({ level: this.level, batchSize: this.config.batchSize }, 'Distiller running');

    while (!signal.aborted) {
      const timeoutMs =
        this.window.length > 0 ? Math.max(0, this.lastDistillAt + this.config.quiescenceMs - Date.now()) : undefined;
      const item = await this.inbox.pull({ signal, timeoutMs });

      if (item !== null) {
        this.window.push(item);
        if (this.window.length >= this.config.batchSize) {
          await this.distillWindow(resources, signal);
        }
        continue;
      }
      if (signal.aborted) {
        break;
      }
      if (this.window.length > 0) {
        await this.distillWindow(resources, signal);
      } else if (this.inbox.isClosed()) {
        return;
      }
    }

    if (this.window.length > 0) {
      this.logger.info({ buffered: this.window.length }, 'Distiller stopped with a partial window');
    }
  }

  /**
   * Distill everything buffered or queued right now as one window.
   */
  async flush(resources: DistillerResources = this.deps, signal?: AbortSignal): Promise<void> {
    for (let item = this.inbox.tryPull(); item !== null; item = this.inbox.tryPull()) {
      this.window.push(item);
    }
    if (this.window.length > 0) {
      await this.distillWindow(resources, signal);
    }
  }

  /**
   * Stop accepting items. run() returns once the queue is drained.
   */
  close(): void {
    this.inbox.close();
  }

  private distillWindow(resources: DistillerResources, signal?: AbortSignal): Promise<void> {
    const window = this.window;
    this.window = [];
    const run = this.serial.then(() => this.distill(window, resources, signal));
    this.serial = run;
    return run;
  }

  private async distill(window: Experience[], resources: DistillerResources, signal?: AbortSignal): Promise<void> {
    if (window.length === 0) return;
    this.lastDistillAt = Date.now();

    const context = { unit: this.name, cycleId: newCycleId(this.name), causeId: window.at(-1)?.id };
    await withCycleContext(context, async () => {
      try {
        const recalled = await this.recallRelated(window, resources.memory);
        const prompt = buildDistillationPrompt(window, recalled, this.config.promptTemplate);

        const text = await retryWithBackoff(
          async (attemptSignal) => {
            const output = await collectText(
              resources.llm.stream(
                { system: this.config.instructions, prompt, temperature: this.config.temperature },
                attemptSignal
              )
            );
            const trimmed = output.trim();
            if (trimmed.length === 0) {
              throw new LLMError('Model returned an empty response', resources.llm.name);
            }
            return trimmed;
          },
          this.config.retry,
          { logger: this.logger, label: `distill:${this.name}`, signal }
        );
        this.deps.health?.recordSuccess(this.name, 'llm');

        const impression = createImpression(this.level, text, this.name);
        await resources.memory.insert(impression, { sources: window.map((item) => item.id) });

        this.logger.info(
          { impressionId: impression.id, level: this.level, sources: window.length, text },
          'Impression distilled'
        );
        this.deps.bus?.emit({ type: 'impression', impression });
        this.deps.onImpression?.(impression);
        await this.feedBack(impression, resources.memory);
      } catch (error) {
        if (signal?.aborted) {
          this.logger.info({ dropped: window.length }, 'Distillation aborted, window dropped');
          return;
        }
        const category = error instanceof StoreError ? 'store' : 'llm';
        this.logger.error({ dropped: window.length, error: errorMessage(error) }, 'Distillation failed, window dropped');
        this.deps.health?.recordFailure(this.name, category, errorMessage(error));
      }
    });
  }

  private async recallRelated(window: readonly Experience[], memory: MemoryStore): Promise<RecallHit[]> {
    const limit = this.config.recall?.limit;
    if (!limit) return [];

    const query = window.map((item) => item.text).join(' ');
    const inWindow = new Set(window.map((item) => item.id));
    try {
      const hits = await memory.recall(query, limit + inWindow.size);
      return hits.filter((hit) => !inWindow.has(hit.impression.id)).slice(0, limit);
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Recall failed, distilling without it');
      return [];
    }
  }

  /**
   * Send the impression on to the feedback target. Feeding back into this
   * distiller goes through a `feedback` sensation linked FEEDBACK_OF to the
   * impression, so the loop stays visible as graph edges.
   */
  private async feedBack(impression: Impression, memory: MemoryStore): Promise<void> {
    const target = this.config.feedback;
    if (!target) return;

    if (target !== this.name) {
      if (!this.deps.route?.(target, impression)) {
        this.logger.warn({ target }, 'Feedback target not found');
      }
      return;
    }

    const sensation = createSensation(impression.text, { modality: 'feedback', device: this.name }, { kind: 'feedback' });
    const { id, created } = await memory.insert(sensation);
    if (!created) return;
    await memory.link(id, 'FEEDBACK_OF', impression.id);
    this.enqueue(sensation);
  }
}

export function createDistiller(
  config: Pick<DistillerConfig, 'name' | 'level' | 'instructions'> & Partial<DistillerConfig>,
  deps: DistillerDeps
): Distiller {
  return new Distiller(config, deps);
}
