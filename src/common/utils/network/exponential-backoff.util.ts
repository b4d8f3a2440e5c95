import { sleep } from './sleep.util';

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 1000;
const DEFAULT_MAX_DELAY_MS = 30_000;
const BACKOFF_MULTIPLIER = 2;

export interface IExponentialBackoffOptions {
  readonly maxAttempts?: number;
  readonly baseDelayMs?: number;
  readonly maxDelayMs?: number;
  readonly shouldRetry: (error: unknown, attempt: number) => boolean;
  // A server-provided hint (e.g. retry_after) wins over the computed delay.
  readonly delayHintMs?: (error: unknown) => number | null;
  readonly onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const resolvePositiveInt = (value: number | undefined, fallback: number): number => {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }

  return Math.floor(value);
};

export const executeWithExponentialBackoff = async <TResult>(
  operation: () => Promise<TResult>,
  options: IExponentialBackoffOptions,
): Promise<TResult> => {
  const maxAttempts: number = resolvePositiveInt(options.maxAttempts, DEFAULT_MAX_ATTEMPTS);
  const baseDelayMs: number = resolvePositiveInt(options.baseDelayMs, DEFAULT_BASE_DELAY_MS);
  const maxDelayMs: number = resolvePositiveInt(options.maxDelayMs, DEFAULT_MAX_DELAY_MS);
  let currentDelayMs: number = baseDelayMs;

  for (let attempt: number = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await operation();
    } catch (error: unknown) {
      const shouldRetry: boolean = attempt < maxAttempts && options.shouldRetry(error, attempt);

      if (!shouldRetry) {
        throw error;
      }

      const hintedDelayMs: number | null = options.delayHintMs?.(error) ?? null;
      const delayMs: number =
        hintedDelayMs !== null ? Math.min(hintedDelayMs, maxDelayMs) : currentDelayMs;

      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
      currentDelayMs = Math.min(currentDelayMs * BACKOFF_MULTIPLIER, maxDelayMs);
    }
  }

  throw new Error('Unreachable backoff branch');
};
