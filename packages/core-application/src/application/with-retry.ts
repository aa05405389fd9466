import type { RetryContext, RetryPolicy, Sleeper } from "../ports/retry-policy";

export type RetryHooks = {
  sleep: Sleeper;
  /** Runs after a failed attempt that will be retried, before the backoff wait. */
  onRetry?: (ctx: RetryContext & { delayMs: number }) => void | Promise<void>;
};

export class RetryExhaustedError extends Error {
  constructor(public attempts: number, public lastError: unknown) {
    super(
      `gave up after ${attempts} attempt(s): ${
        lastError instanceof Error ? lastError.message : String(lastError)
      }`
    );
    this.name = "RetryExhaustedError";
  }
}

/**
 * Runs `fn` until it resolves or the policy gives up. The attempt number
 * (1-based) is passed to `fn`. Rejects with RetryExhaustedError carrying the
 * last failure.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks
): Promise<T> {
  const startedAt = Date.now();
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;

      const retryable = policy.shouldRetry ? policy.shouldRetry(err) : true;
      if (!retryable || attempt === policy.maxAttempts) {
        throw new RetryExhaustedError(attempt, err);
      }

      const delayMs = policy.backoffMs(attempt);
      await hooks.onRetry?.({ attempt, startedAt, lastError, delayMs });
      await hooks.sleep(delayMs);
    }
  }

  // maxAttempts < 1
  throw new RetryExhaustedError(0, lastError);
}
