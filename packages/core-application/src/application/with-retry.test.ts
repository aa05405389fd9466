import { describe, it, expect, vi } from "vitest";

import { RetryExhaustedError, withRetry } from "./with-retry";
import { commitRetryPolicy, dumpRetryPolicy, fixedBackoff } from "./retry-policies";
import { createRecordingSleeper } from "../testing/recording-sleeper";

describe("withRetry", () => {
  it("returns the first successful result without waiting", async () => {
    const { sleep, delays } = createRecordingSleeper();
    const fn = vi.fn(async () => "ok");

    await expect(withRetry(fn, fixedBackoff(3, 1000), { sleep })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it("retries with the policy's backoff until an attempt succeeds", async () => {
    const { sleep, delays } = createRecordingSleeper();
    const seen: number[] = [];
    const fn = async (attempt: number) => {
      seen.push(attempt);
      if (attempt < 3) throw new Error(`boom ${attempt}`);
      return attempt;
    };

    await expect(withRetry(fn, fixedBackoff(5, 1000), { sleep })).resolves.toBe(3);
    expect(seen).toEqual([1, 2, 3]);
    expect(delays).toEqual([1000, 1000]);
  });

  it("gives up after maxAttempts and carries the last error", async () => {
    const { sleep, delays } = createRecordingSleeper();
    const fn = vi.fn(async (attempt: number) => {
      throw new Error(`fail ${attempt}`);
    });

    const err = await withRetry(fn, dumpRetryPolicy(), { sleep }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RetryExhaustedError);
    if (!(err instanceof RetryExhaustedError)) return;
    expect(err.attempts).toBe(3);
    expect(err.lastError).toEqual(new Error("fail 3"));
    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([5000, 5000]);
  });

  it("stops immediately when shouldRetry rejects the error", async () => {
    const { sleep, delays } = createRecordingSleeper();
    const fn = vi.fn(async () => {
      throw new Error("fatal");
    });
    const policy = { ...fixedBackoff(5, 1000), shouldRetry: () => false };

    await expect(withRetry(fn, policy, { sleep })).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it("lengthens only the first commit backoff and calls onRetry before each wait", async () => {
    const { sleep, delays } = createRecordingSleeper();
    const retries: Array<[number, number]> = [];

    await expect(
      withRetry(
        async () => {
          throw new Error("locked");
        },
        commitRetryPolicy(),
        { sleep, onRetry: ({ attempt, delayMs }) => void retries.push([attempt, delayMs]) }
      )
    ).rejects.toBeInstanceOf(RetryExhaustedError);

    expect(delays).toEqual([10_000, 5_000, 5_000, 5_000]);
    expect(retries).toEqual([
      [1, 10_000],
      [2, 5_000],
      [3, 5_000],
      [4, 5_000],
    ]);
  });
});
