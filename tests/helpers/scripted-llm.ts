/**
 * Scripted LLM Provider for Testing
 *
 * A streaming LLMProvider that replays predetermined responses, so
 * distillers and the Will can be tested without real model calls.
 */

import type { LLMProvider, LLMRequest } from '../../src/llm/provider.js';
import { LLMError } from '../../src/core/errors.js';

/**
 * One scripted call.
 * - string: streamed as a single chunk
 * - string[]: streamed chunk by chunk
 * - Error: thrown before the first chunk
 * - object: chunks, then optionally a failure mid-stream or a stall that
 *   lasts until the request is aborted
 */
export type ScriptedResponse =
  | string
  | string[]
  | Error
  | { chunks: string[]; failWith?: Error; delayMs?: number; stall?: boolean };

export class ScriptedLLM implements LLMProvider {
  readonly name = 'scripted-test';

  /** Requests received for assertions */
  readonly requests: LLMRequest[] = [];

  private readonly script: ScriptedResponse[];
  private readonly fallback: ScriptedResponse | undefined;
  private index = 0;

  /**
   * @param fallback - replayed for every call after the script runs out
   */
  constructor(script: ScriptedResponse[], fallback?: ScriptedResponse) {
    this.script = [...script];
    this.fallback = fallback;
  }

  get callCount(): number {
    return this.requests.length;
  }

  isAvailable(): boolean {
    return true;
  }

  async *stream(request: LLMRequest, signal?: AbortSignal): AsyncIterable<string> {
    this.requests.push(request);
    const scripted = this.script[this.index++] ?? this.fallback;
    if (scripted === undefined) {
      throw new LLMError(
        `ScriptedLLM: script exhausted after ${String(this.script.length)} responses`,
        this.name,
        { retryable: false }
      );
    }

    if (scripted instanceof Error) {
      throw scripted;
    }
    if (typeof scripted === 'string') {
      yield scripted;
      return;
    }
    if (Array.isArray(scripted)) {
      for (const chunk of scripted) {
        yield chunk;
      }
      return;
    }

    for (const chunk of scripted.chunks) {
      if (scripted.delayMs !== undefined) {
        await new Promise((resolve) => setTimeout(resolve, scripted.delayMs));
      }
      signal?.throwIfAborted();
      yield chunk;
    }
    if (scripted.failWith) {
      throw scripted.failWith;
    }
    if (scripted.stall && signal) {
      await new Promise<void>((resolve) => {
        if (signal.aborted) {
          resolve();
          return;
        }
        signal.addEventListener('abort', () => {
          resolve();
        }, { once: true });
      });
      signal.throwIfAborted();
    }
  }
}
