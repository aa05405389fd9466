export type RetryContext = {
  attempt: number;
  startedAt: number;
  lastError?: unknown;
};

export type RetryPolicy = {
  maxAttempts: number;
  /** Wait after the given failed attempt (1-based) before the next one. */
  backoffMs: (failedAttempt: number) => number;
  shouldRetry?: (err: unknown) => boolean;
};

export type Sleeper = (ms: number) => Promise<void>;
