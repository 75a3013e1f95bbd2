/**
 * Unit tests for the retry policy.
 */
import { describe, test, expect } from "vitest";
import { TransientLoadError, TransientTransferError } from "../src/core/exceptions.js";
import { RetryExhaustedError, computeDelay, withRetry } from "../src/core/retry.js";
import type { RetryPolicy } from "../src/core/retry.js";

const policy = (retries: number, delayMs = 0, backoff: RetryPolicy["backoff"] = "fixed"): RetryPolicy => ({
  retries,
  delayMs,
  backoff,
});

describe("computeDelay", () => {
  test("fixed", () => {
    expect(computeDelay(1, policy(3, 1000))).toBe(1000);
    expect(computeDelay(3, policy(3, 1000))).toBe(1000);
  });

  test("linear", () => {
    expect(computeDelay(1, policy(3, 500, "linear"))).toBe(500);
    expect(computeDelay(3, policy(3, 500, "linear"))).toBe(1500);
  });
});

describe("withRetry", () => {
  test("first success is returned", async () => {
    let calls = 0;
    const result = await withRetry(async () => {
      calls++;
      return "ok";
    }, policy(3));
    expect(result).toBe("ok");
    expect(calls).toBe(1);
  });

  test("transient errors are retried until success", async () => {
    const attempts: number[] = [];
    const result = await withRetry(async (attempt) => {
      attempts.push(attempt);
      if (attempt < 3) throw new TransientTransferError("https://trips.test/x", "HTTP 503", 503);
      return attempt;
    }, policy(3));
    expect(result).toBe(3);
    expect(attempts).toEqual([1, 2, 3]);
  });

  test("gives up after retries + 1 attempts", async () => {
    let calls = 0;
    const failing = withRetry(async () => {
      calls++;
      throw new TransientLoadError("staging.t", "connection reset");
    }, policy(2));
    await expect(failing).rejects.toThrow(RetryExhaustedError);
    expect(calls).toBe(3);
  });

  test("last error is carried as the cause", async () => {
    const last = new TransientLoadError("staging.t", "deadlock");
    try {
      await withRetry(async () => {
        throw last;
      }, policy(1));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(RetryExhaustedError);
      if (err instanceof RetryExhaustedError) {
        expect(err.attempts).toBe(2);
        expect(err.cause).toBe(last);
      }
    }
  });

  test("other errors are not retried", async () => {
    let calls = 0;
    const failing = withRetry(async () => {
      calls++;
      throw new Error("bug");
    }, policy(3));
    await expect(failing).rejects.toThrow(RetryExhaustedError);
    expect(calls).toBe(1);
  });

  test("sleeps between attempts with the backoff delay", async () => {
    const slept: number[] = [];
    const retried: number[] = [];
    await expect(
      withRetry(
        async () => {
          throw new TransientTransferError("https://trips.test/x", "timeout");
        },
        policy(3, 100, "linear"),
        {
          sleep: async (ms) => {
            slept.push(ms);
          },
          onRetry: (_err, attempt) => retried.push(attempt),
        },
      ),
    ).rejects.toThrow(RetryExhaustedError);
    expect(slept).toEqual([100, 200, 300]);
    expect(retried).toEqual([1, 2, 3]);
  });
});
