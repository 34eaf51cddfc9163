import { beforeEach, describe, expect, it, vi } from 'vitest';
import { APICallError } from 'ai';
import { VercelAIProvider } from '../../../src/llm/vercel-ai-provider.js';
import { collectText } from '../../../src/llm/provider.js';
import { LLMError } from '../../../src/core/errors.js';
import { createMockLogger } from '../../helpers/factories.js';

const mocks = vi.hoisted(() => ({
  streamText: vi.fn(),
  chatModel: vi.fn((id: string) => ({ id })),
  openRouterModel: vi.fn((id: string) => ({ id })),
}));

vi.mock('ai', async (importOriginal) => ({
  ...(await importOriginal<typeof import('ai')>()),
  streamText: mocks.streamText,
}));
vi.mock('@openrouter/ai-sdk-provider', () => ({ createOpenRouter: () => mocks.openRouterModel }));
vi.mock('@ai-sdk/openai', () => ({ createOpenAI: () => ({ chat: mocks.chatModel }) }));

function streamOf(parts: unknown[]): { fullStream: AsyncIterable<unknown> } {
  return {
    fullStream: (async function* () {
      for (const part of parts) yield part;
    })(),
  };
}

const request = { system: 'Describe what just happened.', prompt: 'Timeline:\n...' };

describe('VercelAIProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('yields text deltas and ignores other stream parts', async () => {
    mocks.streamText.mockReturnValue(
      streamOf([
        { type: 'start' },
        { type: 'text-delta', id: 't1', text: 'Hel' },
        { type: 'text-delta', id: 't1', text: 'lo' },
        { type: 'finish' },
      ])
    );
    const provider = new VercelAIProvider({ apiKey: 'test-secret', model: 'test/model' }, createMockLogger());

    expect(await collectText(provider.stream({ ...request, temperature: 0.2 }))).toBe('Hello');
    expect(mocks.streamText).toHaveBeenCalledWith(
      expect.objectContaining({
        system: 'Describe what just happened.',
        prompt: 'Timeline:\n...',
        temperature: 0.2,
        maxRetries: 0,
      })
    );
    expect(mocks.openRouterModel).toHaveBeenCalledWith('test/model');
  });

  it('lets the request override the model', async () => {
    mocks.streamText.mockReturnValue(streamOf([]));
    const provider = new VercelAIProvider({ apiKey: 'test-secret', model: 'test/model' });

    await collectText(provider.stream({ ...request, model: 'test/other' }));

    expect(mocks.openRouterModel).toHaveBeenCalledWith('test/other');
  });

  it('talks to a local server through the chat endpoint', async () => {
    mocks.streamText.mockReturnValue(streamOf([{ type: 'text-delta', id: 't1', text: 'ok' }]));
    const provider = new VercelAIProvider({ baseUrl: 'http://localhost:1234/v1', model: 'local-model' });

    expect(provider.name).toBe('local');
    expect(await collectText(provider.stream(request))).toBe('ok');
    expect(mocks.chatModel).toHaveBeenCalledWith('local-model');
  });

  it('maps a rate limit to a retryable error with its status', async () => {
    const apiError = new APICallError({
      message: 'Too many requests',
      url: 'https://llm.test/v1/chat',
      requestBodyValues: {},
      statusCode: 429,
      isRetryable: false,
    });
    mocks.streamText.mockReturnValue(streamOf([{ type: 'error', error: apiError }]));
    const provider = new VercelAIProvider({ apiKey: 'test-secret', model: 'test/model' });

    const failure = collectText(provider.stream(request));

    await expect(failure).rejects.toBeInstanceOf(LLMError);
    await expect(failure).rejects.toMatchObject({ statusCode: 429, retryable: true, message: 'Too many requests' });
  });

  it('does not retry a client error', async () => {
    const apiError = new APICallError({
      message: 'Bad request',
      url: 'https://llm.test/v1/chat',
      requestBodyValues: {},
      statusCode: 400,
      isRetryable: false,
    });
    mocks.streamText.mockReturnValue(streamOf([{ type: 'error', error: apiError }]));
    const provider = new VercelAIProvider({ apiKey: 'test-secret', model: 'test/model' });

    await expect(collectText(provider.stream(request))).rejects.toMatchObject({ statusCode: 400, retryable: false });
  });

  it('refuses to stream without credentials', async () => {
    const provider = new VercelAIProvider({ apiKey: '', model: 'test/model' });

    expect(provider.isAvailable()).toBe(false);
    await expect(collectText(provider.stream(request))).rejects.toMatchObject({
      message: 'VercelAIProvider not configured',
      retryable: false,
    });
    expect(mocks.streamText).not.toHaveBeenCalled();
  });
});
