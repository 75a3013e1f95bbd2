/**
 * Bounded, stage-scoped retry.
 */
import { setTimeout as sleep } from "node:timers/promises";
import { TransientLoadError, TransientTransferError } from "./exceptions.js";

export type Backoff = "fixed" | "linear";

export interface RetryPolicy {
  /** Extra attempts after the first one. */
  retries: number;
  delayMs: number;
  backoff: Backoff;
}

export interface RetryHooks {
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  isRetryable?: (err: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

/** Error raised by the last attempt, with the number of attempts made. */
export class RetryExhaustedError extends Error {
  attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`Gave up after ${attempts} attempt(s)`, { cause });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

export function isTransient(err: unknown): boolean {
  return err instanceof TransientTransferError || err instanceof TransientLoadError;
}

export function computeDelay(attempt: number, policy: RetryPolicy): number {
  const n = Math.max(1, Math.floor(attempt));
  return policy.backoff === "linear" ? policy.delayMs * n : policy.delayMs;
}

/**
 * Run `fn` up to `retries + 1` times. Non-retryable errors and the error of the
 * final attempt are rethrown wrapped in {@link RetryExhaustedError}.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const retryable = hooks.isRetryable ?? isTransient;
  const wait = hooks.sleep ?? ((ms: number) => sleep(ms));
  const maxAttempts = Math.max(0, policy.retries) + 1;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || !retryable(err)) {
        throw new RetryExhaustedError(attempt, err);
      }
      const delay = computeDelay(attempt, policy);
      hooks.onRetry?.(err, attempt, delay);
      if (delay > 0) await wait(delay);
    }
  }
}
