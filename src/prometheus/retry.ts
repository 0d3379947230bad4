import { debug } from '../debug.js';

export interface RetryPolicy {
  /** Total attempts including the first call. */
  maxAttempts: number;
  backoffBaseMs: number;
  maxBackoffMs: number;
}

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffBaseMs: 500,
  maxBackoffMs: 8000,
};

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/** Delay before retrying after the given (1-based) failed attempt. */
export const backoffDelay = (policy: RetryPolicy, attempt: number): number =>
  Math.min(policy.maxBackoffMs, policy.backoffBaseMs * 2 ** Math.max(0, attempt - 1));

export const withRetry = async <T>(
  policy: RetryPolicy,
  operation: () => Promise<T>,
  hooks: RetryHooks = {},
): Promise<T> => {
  const sleep = hooks.sleep ?? defaultSleep;
  const isRetryable = hooks.isRetryable ?? (() => true);
  const attempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= attempts || !isRetryable(error)) {
        debug('withRetry giving up', { attempt, maxAttempts: attempts });
        throw error;
      }
      const delayMs = backoffDelay(policy, attempt);
      debug('withRetry retrying', {
        attempt,
        delayMs,
        error: error instanceof Error ? error.message : String(error),
      });
      hooks.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs);
    }
  }
};
