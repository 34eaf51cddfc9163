/**
 * LLM Provider interface.
 *
 * Abstracts the model backend (OpenRouter, a local OpenAI-compatible
 * server, a scripted fake in tests). Distillers and the Will only ever
 * stream text; structure is recovered from the text by the caller.
 */

import type { Logger } from '../types/logger.js';
import { logTranscript } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';

/**
 * One streamed generation.
 */
export interface LLMRequest {
  /** Fixed instruction text */
  system: string;
  /** Rendered context (timeline, snapshot) */
  prompt: string;
  /** Explicit model (overrides the provider default) */
  model?: string | undefined;
  /** Temperature (0-2, lower = more focused) */
  temperature?: number | undefined;
  /** Maximum tokens to generate */
  maxTokens?: number | undefined;
}

export interface LLMProvider {
  readonly name: string;

  /** Whether the provider is configured well enough to be called */
  isAvailable(): boolean;

  /**
   * Stream the response as text chunks. Aborting `signal` ends the stream
   * with an AbortError.
   *
   * @throws LLMError on provider failures
   */
  stream(request: LLMRequest, signal?: AbortSignal): AsyncIterable<string>;
}

/**
 * Base provider that logs every request and writes prompt and response to
 * the transcript log. Subclasses implement doStream().
 */
export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;
  protected readonly logger: Logger | undefined;
  private requestCounter = 0;

  constructor(logger?: Logger) {
    this.logger = logger?.child({ component: 'llm' });
  }

  abstract isAvailable(): boolean;

  async *stream(request: LLMRequest, signal?: AbortSignal): AsyncIterable<string> {
    const requestId = `req_${String(++this.requestCounter)}`;
    const startTime = Date.now();

    this.logger?.debug(
      {
        requestId,
        provider: this.name,
        model: request.model,
        temperature: request.temperature,
        promptLength: request.prompt.length,
      },
      'LLM stream started'
    );
    logTranscript(
      { logType: 'REQUEST', requestId, provider: this.name },
      `→ REQUEST ${requestId}\n[system]\n${request.system}\n[prompt]\n${request.prompt}`
    );

    let response = '';
    try {
      for await (const chunk of this.doStream(request, signal)) {
        response += chunk;
        yield chunk;
      }
    } catch (error) {
      const durationMs = Date.now() - startTime;
      this.logger?.warn(
        { requestId, provider: this.name, durationMs, error: errorMessage(error) },
        'LLM stream failed'
      );
      logTranscript(
        { logType: 'ERROR', requestId, durationMs },
        `✗ ERROR ${requestId} [${String(durationMs)}ms]: ${errorMessage(error)}`
      );
      throw error;
    }

    const durationMs = Date.now() - startTime;
    this.logger?.debug(
      { requestId, provider: this.name, durationMs, responseLength: response.length },
      'LLM stream completed'
    );
    logTranscript(
      { logType: 'RESPONSE', requestId, durationMs },
      `← RESPONSE ${requestId} [${String(durationMs)}ms]\n${response}`
    );
  }

  /**
   * Perform the actual streaming request.
   */
  protected abstract doStream(request: LLMRequest, signal?: AbortSignal): AsyncIterable<string>;
}

/**
 * Drain a stream into one string.
 */
export async function collectText(stream: AsyncIterable<string>): Promise<string> {
  let text = '';
  for await (const chunk of stream) {
    text += chunk;
  }
  return text;
}
