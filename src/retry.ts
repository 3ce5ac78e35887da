// src/retry.ts
import { wait } from "./util.js";

export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryOptions = {
  retries: number; // extra attempts after the first (3 => up to 4 tries)
  minDelayMs: number;
  maxDelayMs: number;
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: {
    attempt: number;
    maxAttempts: number;
    delayMs: number;
    error: unknown;
  }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  signal?: AbortSignal;
};

export function retryDelayMs(
  attempt: number,
  opts: Pick<
    RetryOptions,
    "minDelayMs" | "maxDelayMs" | "randomFn" | "jitterRatio"
  >,
  customDelayMs?: number,
): number {
  const { minDelayMs, maxDelayMs, randomFn = Math.random } = opts;
  const backoff =
    customDelayMs != null
      ? Math.min(maxDelayMs, customDelayMs)
      : Math.min(maxDelayMs, minDelayMs * Math.pow(2, attempt));
  const jitterRatio = Math.min(1, Math.max(0, opts.jitterRatio ?? 0.2));
  const r = Math.min(1, Math.max(0, randomFn()));
  return backoff + Math.floor(backoff * jitterRatio * r);
}

/**
 * Run `fn` until it succeeds, `shouldRetry` says stop, or retries run out.
 * The last error is rethrown. An aborted signal stops further attempts and
 * rethrows the error that triggered the wait.
 */
export const retry = async <T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions,
): Promise<T> => {
  const { retries, shouldRetry, onRetry, signal } = opts;
  const maxAttempts = retries + 1;
  let attempt = 0;
  while (true) {
    try {
      return await fn(attempt);
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized: { retry: boolean; delayMs?: number } =
        typeof decision === "boolean" ? { retry: decision } : decision;
      if (attempt >= retries || !normalized.retry || signal?.aborted) {
        throw err;
      }
      const custom =
        typeof normalized.delayMs === "number" &&
        Number.isFinite(normalized.delayMs) &&
        normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const delayMs = retryDelayMs(attempt, opts, custom);
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error: err });
      const completed = await wait(delayMs, signal);
      if (!completed) throw err;
      attempt += 1;
    }
  }
};
