/**
 * Vercel AI SDK Provider
 *
 * Streaming provider over the Vercel AI SDK (ai package v5). Talks to
 * OpenRouter, or to a local OpenAI-compatible server (LM Studio, llama.cpp,
 * Ollama's /v1 endpoint). The SDK's own retries are disabled; the runtime
 * retry policy wraps every call.
 */

import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { createOpenAI } from '@ai-sdk/openai';
import { APICallError, streamText } from 'ai';
import type { LanguageModel } from 'ai';
import type { Logger } from '../types/logger.js';
import type { LLMRequest } from './provider.js';
import { BaseLLMProvider } from './provider.js';
import { LLMError, errorMessage, isAbortError } from '../core/errors.js';

/**
 * OpenRouter configuration.
 */
export interface OpenRouterConfig {
  /** API key (required for OpenRouter) */
  apiKey: string;
  model: string;
}

/**
 * Local OpenAI-compatible server configuration.
 */
export interface LocalServerConfig {
  /** Base URL of the server (e.g. http://localhost:1234/v1) */
  baseUrl: string;
  model: string;
}

export type VercelAIProviderConfig = OpenRouterConfig | LocalServerConfig;

function isOpenRouterConfig(config: VercelAIProviderConfig): config is OpenRouterConfig {
  return 'apiKey' in config;
}

export class VercelAIProvider extends BaseLLMProvider {
  readonly name: string;
  private readonly config: VercelAIProviderConfig;

  constructor(config: VercelAIProviderConfig, logger?: Logger) {
    super(logger);
    this.config = config;
    this.name = isOpenRouterConfig(config) ? 'openrouter' : 'local';

    this.logger?.info(
      {
        provider: this.name,
        model: config.model,
        ...(isOpenRouterConfig(config) ? {} : { baseUrl: config.baseUrl }),
      },
      'VercelAIProvider initialized'
    );
  }

  isAvailable(): boolean {
    if (isOpenRouterConfig(this.config)) {
      return Boolean(this.config.apiKey && this.config.model);
    }
    return Boolean(this.config.baseUrl && this.config.model);
  }

  private getModel(modelId: string): LanguageModel {
    if (isOpenRouterConfig(this.config)) {
      return createOpenRouter({ apiKey: this.config.apiKey })(modelId);
    }
    return createOpenAI({
      baseURL: this.config.baseUrl,
      apiKey: 'no-key-required',
    }).chat(modelId);
  }

  protected async *doStream(request: LLMRequest, signal?: AbortSignal): AsyncIterable<string> {
    if (!this.isAvailable()) {
      throw new LLMError('VercelAIProvider not configured', this.name, { retryable: false });
    }

    const result = streamText({
      model: this.getModel(request.model ?? this.config.model),
      system: request.system,
      prompt: request.prompt,
      ...(request.temperature !== undefined && { temperature: request.temperature }),
      ...(request.maxTokens !== undefined && { maxOutputTokens: request.maxTokens }),
      // Disable AI SDK's built-in retry (the runtime retry policy applies)
      maxRetries: 0,
      ...(signal && { abortSignal: signal }),
      onError: ({ error }) => {
        this.logger?.debug({ error: errorMessage(error) }, 'AI SDK stream error');
      },
    });

    try {
      for await (const part of result.fullStream) {
        switch (part.type) {
          case 'text-delta':
            if (part.text) yield part.text;
            break;
          case 'error':
            throw part.error;
          default:
            break;
        }
      }
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) {
        throw error;
      }
      throw this.mapError(error);
    }
  }

  /**
   * Map AI SDK errors to LLMError, keeping status codes and retryability.
   */
  private mapError(error: unknown): LLMError {
    if (error instanceof LLMError) {
      return error;
    }
    const message = errorMessage(error);

    if (APICallError.isInstance(error)) {
      const statusCode = error.statusCode;
      const retryable =
        error.isRetryable || statusCode === 408 || statusCode === 429 || (statusCode ?? 0) >= 500;
      return new LLMError(message, this.name, {
        ...(statusCode !== undefined && { statusCode }),
        retryable,
        cause: error,
      });
    }

    if (message.includes('429') || message.toLowerCase().includes('rate limit')) {
      return new LLMError(`Rate limit: ${message}`, this.name, { statusCode: 429, retryable: true, cause: error });
    }

    // Network failures have no status; treat them as transient
    return new LLMError(message, this.name, { retryable: true, cause: error });
  }
}

export function createVercelAIProvider(config: VercelAIProviderConfig, logger?: Logger): VercelAIProvider {
  return new VercelAIProvider(config, logger);
}
