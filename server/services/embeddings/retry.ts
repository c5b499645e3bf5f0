import { isAbortError, sleep, TimeoutError } from "../../utils/abort";
import { ProviderError } from "../retrieval/errors";

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export type RetryState = "attempting" | "backing_off" | "succeeded" | "exhausted" | "aborted";

export type RetryHooks = {
  signal?: AbortSignal;
  random?: () => number;
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onTransition?: (state: RetryState, attempt: number, detail?: { delayMs?: number; error?: unknown }) => void;
};

/** `base * 2^(attempt-1)`, scaled by a jitter factor in [0.5, 1), capped at `maxDelayMs`. */
export const backoffDelay = (attempt: number, policy: RetryPolicy, random: () => number = Math.random): number => {
  const raw = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  const jitter = 0.5 + 0.5 * Math.min(Math.max(random(), 0), 0.999999);
  return Math.min(policy.maxDelayMs, Math.floor(raw * jitter));
};

export const isRetryable = (error: unknown): boolean => {
  if (error instanceof ProviderError) return error.retryable;
  if (error instanceof TimeoutError) return true;
  return !isAbortError(error);
};

/**
 * Runs `task` until it succeeds, hits a non-retryable error or uses up
 * `maxAttempts`. The final error is rethrown unchanged.
 */
export async function retryWithBackoff<T>(
  task: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const wait = hooks.wait ?? sleep;
  const transition = hooks.onTransition ?? (() => undefined);
  const attempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    transition("attempting", attempt);
    try {
      const value = await task(attempt);
      transition("succeeded", attempt);
      return value;
    } catch (error) {
      if (hooks.signal?.aborted || isAbortError(error)) {
        transition("aborted", attempt, { error });
        throw error;
      }
      if (attempt >= attempts || !isRetryable(error)) {
        transition("exhausted", attempt, { error });
        throw error;
      }
      const delayMs = backoffDelay(attempt, policy, hooks.random);
      transition("backing_off", attempt, { delayMs, error });
      await wait(delayMs, hooks.signal);
    }
  }
}
