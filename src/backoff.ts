// src/backoff.ts

export type BackoffPolicy = {
  baseDelayMs: number;
  // >1 turns on exponential growth per consecutive failure
  multiplier?: number;
  maxDelayMs?: number;
};

type Entry = { retryAt: number; failures: number };

/**
 * Per-path cooldown after a failed attempt, so a file that keeps failing is
 * not resubmitted every poll cycle.
 */
export class BackoffLedger {
  private readonly table = new Map<string, Entry>();
  private readonly baseDelayMs: number;
  private readonly multiplier: number;
  private readonly maxDelayMs: number;

  constructor({ baseDelayMs, multiplier = 1, maxDelayMs }: BackoffPolicy) {
    if (!Number.isFinite(baseDelayMs) || baseDelayMs < 0) {
      throw new Error("baseDelayMs must be a finite number >= 0");
    }
    this.baseDelayMs = baseDelayMs;
    this.multiplier = Math.max(1, multiplier);
    this.maxDelayMs = Math.max(baseDelayMs, maxDelayMs ?? baseDelayMs);
  }

  shouldSkip(path: string, now: number): boolean {
    const entry = this.table.get(path);
    return entry != null && entry.retryAt > now;
  }

  /**
   * Record a failure at `now`. Without an explicit `delayMs` the policy
   * decides: the base delay, grown by `multiplier` for each consecutive
   * failure and capped at `maxDelayMs`. Returns the retry timestamp.
   */
  recordFailure(path: string, now: number, delayMs?: number): number {
    const failures = (this.table.get(path)?.failures ?? 0) + 1;
    const delay = delayMs ?? this.policyDelay(failures);
    const retryAt = now + delay;
    this.table.set(path, { retryAt, failures });
    return retryAt;
  }

  forget(path: string): void {
    this.table.delete(path);
  }

  retryAt(path: string): number | undefined {
    return this.table.get(path)?.retryAt;
  }

  get size(): number {
    return this.table.size;
  }

  private policyDelay(failures: number): number {
    const grown = this.baseDelayMs * Math.pow(this.multiplier, failures - 1);
    return Math.min(this.maxDelayMs, grown);
  }
}

/**
 * Fixed delay when max == base, doubling up to max otherwise.
 */
export function ledgerFromConfig(cfg: {
  failureBackoffMs: number;
  maxFailureBackoffMs: number;
}): BackoffLedger {
  return new BackoffLedger({
    baseDelayMs: cfg.failureBackoffMs,
    multiplier: cfg.maxFailureBackoffMs > cfg.failureBackoffMs ? 2 : 1,
    maxDelayMs: cfg.maxFailureBackoffMs,
  });
}
