import { describe, expect, it, vi } from 'vitest';

import { executeWithExponentialBackoff } from './exponential-backoff.util';

describe('executeWithExponentialBackoff', (): void => {
  it('retries until the operation succeeds', async (): Promise<void> => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('busy'))
      .mockResolvedValueOnce('sent');
    const onRetry = vi.fn();

    const result: string = await executeWithExponentialBackoff(operation, {
      maxAttempts: 3,
      baseDelayMs: 1,
      shouldRetry: (): boolean => true,
      onRetry,
    });

    expect(result).toBe('sent');
    expect(operation).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, 1);
  });

  it('stops on errors that should not be retried', async (): Promise<void> => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('fatal'));

    await expect(
      executeWithExponentialBackoff(operation, {
        maxAttempts: 5,
        baseDelayMs: 1,
        shouldRetry: (): boolean => false,
      }),
    ).rejects.toThrow('fatal');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('gives up after max attempts', async (): Promise<void> => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('busy'));

    await expect(
      executeWithExponentialBackoff(operation, {
        maxAttempts: 3,
        baseDelayMs: 1,
        shouldRetry: (): boolean => true,
      }),
    ).rejects.toThrow('busy');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('prefers the delay hint over the computed delay', async (): Promise<void> => {
    const operation = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new Error('429'))
      .mockResolvedValueOnce(7);
    const onRetry = vi.fn();

    await executeWithExponentialBackoff(operation, {
      maxAttempts: 2,
      baseDelayMs: 500,
      maxDelayMs: 1000,
      shouldRetry: (): boolean => true,
      delayHintMs: (): number => 2,
      onRetry,
    });

    expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, 2);
  });
});
