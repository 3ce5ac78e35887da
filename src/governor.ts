// src/governor.ts
import { describeError, type Logger } from "./logger.js";

/**
 * Bounded pool of in-flight jobs keyed by path.
 *
 * Unlike a queueing limiter, admission never waits: when every slot is taken
 * (or the path is already claimed) `tryAdmit` returns false and the caller
 * tries again next cycle. Claim and release are synchronous, so the event
 * loop guarantees a path is claimed at most once.
 */
export class ConcurrencyGovernor {
  readonly capacity: number;
  private readonly claims = new Map<string, Promise<void>>();
  private readonly logger?: Logger;

  constructor(capacity: number, opts: { logger?: Logger } = {}) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error("capacity must be an integer >= 1");
    }
    this.capacity = capacity;
    this.logger = opts.logger;
  }

  get active(): number {
    return this.claims.size;
  }

  get available(): number {
    return this.capacity - this.claims.size;
  }

  isClaimed(path: string): boolean {
    return this.claims.has(path);
  }

  tryAdmit(path: string, task: () => Promise<void>): boolean {
    if (this.claims.has(path) || this.claims.size >= this.capacity) {
      return false;
    }
    // the task starts on the next microtask, after the claim is recorded
    const run = Promise.resolve()
      .then(task)
      .catch((err: unknown) => {
        this.logger?.error("job task rejected", {
          path,
          ...describeError(err),
        });
      })
      .finally(() => this.release(path));
    this.claims.set(path, run);
    return true;
  }

  /** Resolves once every job admitted so far has settled. */
  async drain(): Promise<void> {
    while (this.claims.size > 0) {
      await Promise.all(Array.from(this.claims.values()));
    }
  }

  private release(path: string): void {
    this.claims.delete(path);
  }
}
