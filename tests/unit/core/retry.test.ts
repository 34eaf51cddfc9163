import { describe, it, expect } from 'vitest';
import { backoffDelay, retryWithBackoff, withTimeout } from '../../../src/core/retry.js';
import { LLMError, TimeoutError } from '../../../src/core/errors.js';
import { createMockLogger } from '../../helpers/factories.js';

const policy = { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1, timeoutMs: 0 };

describe('backoffDelay', () => {
  it('doubles from the base and stops at the cap', () => {
    const limits = { baseDelayMs: 1_000, maxDelayMs: 30_000 };
    expect([0, 1, 2, 4, 5, 6].map((retry) => backoffDelay(limits, retry))).toEqual([
      1_000, 2_000, 4_000, 16_000, 30_000, 30_000,
    ]);
  });
});

describe('retryWithBackoff', () => {
  it('stops at once when shouldRetry declines', async () => {
    let attempts = 0;

    await expect(
      retryWithBackoff(
        () => {
          attempts++;
          return Promise.reject(new Error('partial'));
        },
        policy,
        { shouldRetry: () => false }
      )
    ).rejects.toThrow('partial');
    expect(attempts).toBe(1);
  });

  it('returns the first success', async () => {
    let attempts = 0;
    const result = await retryWithBackoff(() => {
      attempts++;
      return attempts < 3 ? Promise.reject(new Error('flaky')) : Promise.resolve('ok');
    }, policy);

    expect(result).toBe('ok');
    expect(attempts).toBe(3);
  });

  it('throws the last error once the budget is spent', async () => {
    const logger = createMockLogger();
    let attempts = 0;

    await expect(
      retryWithBackoff(
        () => {
          attempts++;
          return Promise.reject(new Error(`failure ${String(attempts)}`));
        },
        policy,
        { logger, label: 'test' }
      )
    ).rejects.toThrow('failure 3');
    expect(logger.messages('warn')).toEqual(['Retrying after transient error', 'Retrying after transient error']);
    expect(logger.messages('error')).toEqual(['All retry attempts exhausted']);
  });

  it('gives up at once on a non-retryable model error', async () => {
    let attempts = 0;
    await expect(
      retryWithBackoff(() => {
        attempts++;
        return Promise.reject(new LLMError('Invalid API key', 'test', { statusCode: 401, retryable: false }));
      }, policy)
    ).rejects.toBeInstanceOf(LLMError);
    expect(attempts).toBe(1);
  });

  it('counts a timed-out attempt as a failure', async () => {
    let attempts = 0;
    const result = await retryWithBackoff(
      (signal) => {
        attempts++;
        if (attempts > 1) return Promise.resolve('second try');
        return new Promise<string>((_, reject) => {
          signal.addEventListener('abort', () => {
            reject(new Error('aborted'));
          });
        });
      },
      { ...policy, timeoutMs: 10 }
    );

    expect(result).toBe('second try');
    expect(attempts).toBe(2);
  });

  it('stops when the caller aborts', async () => {
    const controller = new AbortController();
    controller.abort();
    let attempts = 0;

    await expect(
      retryWithBackoff(
        () => {
          attempts++;
          return Promise.reject(new Error('fails'));
        },
        policy,
        { signal: controller.signal }
      )
    ).rejects.toThrow('fails');
    expect(attempts).toBe(1);
  });
});

describe('withTimeout', () => {
  it('rejects with a TimeoutError and aborts the work', async () => {
    let aborted = false;
    const work = withTimeout(
      (signal) =>
        new Promise<void>(() => {
          signal.addEventListener('abort', () => {
            aborted = true;
          });
        }),
      10,
      undefined,
      'Slow call'
    );

    await expect(work).rejects.toThrow(new TimeoutError(10, 'Slow call').message);
    expect(aborted).toBe(true);
  });
});
