import type { RetryPolicy } from "../ports/retry-policy";

export function fixedBackoff(maxAttempts: number, delayMs: number): RetryPolicy {
  return { maxAttempts, backoffMs: () => delayMs };
}

export function repositoryInitRetryPolicy(): RetryPolicy {
  return fixedBackoff(3, 3_000);
}

export function stageFileRetryPolicy(): RetryPolicy {
  return fixedBackoff(5, 1_000);
}

/**
 * Commits race background filesystem activity on shared hosts, so the first
 * failure gets a longer pause than the ones after it.
 */
export function commitRetryPolicy(): RetryPolicy {
  return {
    maxAttempts: 5,
    backoffMs: (failedAttempt) => (failedAttempt === 1 ? 10_000 : 5_000),
  };
}

export function dumpRetryPolicy(): RetryPolicy {
  return fixedBackoff(3, 5_000);
}
