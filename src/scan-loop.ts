// src/scan-loop.ts
import path from "node:path";
import type { BackoffLedger } from "./backoff.js";
import { ERROR_COOLDOWN_MS } from "./constants.js";
import type { ConcurrencyGovernor } from "./governor.js";
import type { JobOutcome } from "./job.js";
import { describeError, NullLogger, type Logger } from "./logger.js";
import type { ReadinessDetector } from "./readiness.js";
import { fileExists, wait } from "./util.js";

export interface JobRunner {
  run(source: string, signal: AbortSignal): Promise<JobOutcome>;
}

export type CycleReport = {
  ready: number;
  admitted: number;
  // ready but no free slot
  deferred: number;
  backedOff: number;
  claimed: number;
  vanished: number;
};

export type ScanLoopOptions = {
  detector: ReadinessDetector;
  ledger: BackoffLedger;
  governor: ConcurrencyGovernor;
  executor: JobRunner;
  signal: AbortSignal;
  pollIntervalMs: number;
  errorCooldownMs?: number;
  clock?: () => number;
  logger?: Logger;
};

export class ScanLoop {
  private readonly detector: ReadinessDetector;
  private readonly ledger: BackoffLedger;
  private readonly governor: ConcurrencyGovernor;
  private readonly executor: JobRunner;
  private readonly signal: AbortSignal;
  private readonly pollIntervalMs: number;
  private readonly errorCooldownMs: number;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(opts: ScanLoopOptions) {
    this.detector = opts.detector;
    this.ledger = opts.ledger;
    this.governor = opts.governor;
    this.executor = opts.executor;
    this.signal = opts.signal;
    this.pollIntervalMs = opts.pollIntervalMs;
    this.errorCooldownMs = opts.errorCooldownMs ?? ERROR_COOLDOWN_MS;
    this.clock = opts.clock ?? Date.now;
    this.logger = opts.logger ?? new NullLogger();
  }

  async runCycle(): Promise<CycleReport> {
    const report = await this.detector.scan(this.clock(), (p) =>
      this.governor.isClaimed(p),
    );
    for (const gone of report.vanished) {
      this.ledger.forget(gone);
    }

    const out: CycleReport = {
      ready: report.ready.length,
      admitted: 0,
      deferred: 0,
      backedOff: 0,
      claimed: report.files.filter((f) => f.readiness === "claimed").length,
      vanished: report.vanished.length,
    };

    for (const source of report.ready) {
      if (this.signal.aborted) break;
      if (this.ledger.shouldSkip(source, this.clock())) {
        out.backedOff++;
        continue;
      }
      if (this.governor.isClaimed(source)) {
        out.claimed++;
        continue;
      }
      if (this.governor.tryAdmit(source, () => this.runJob(source))) {
        out.admitted++;
        this.logger.info("admitted", {
          file: path.basename(source),
          active: this.governor.active,
        });
      } else {
        out.deferred++;
      }
    }

    if (out.admitted || out.deferred) {
      this.logger.debug("cycle", out);
    }
    return out;
  }

  /**
   * Cycle every `pollIntervalMs` until the shutdown signal aborts. Does not
   * wait for in-flight jobs; use the governor's `drain()` for that.
   */
  async run(): Promise<void> {
    this.logger.info("watching", {
      dir: this.detector.root,
      pollIntervalMs: this.pollIntervalMs,
      capacity: this.governor.capacity,
    });
    while (!this.signal.aborted) {
      let delay = this.pollIntervalMs;
      try {
        await this.runCycle();
      } catch (err) {
        this.logger.error("scan cycle failed", describeError(err));
        delay = this.errorCooldownMs;
      }
      if (!(await wait(delay, this.signal))) break;
    }
    this.logger.info("stopped admitting", { active: this.governor.active });
  }

  private async runJob(source: string): Promise<void> {
    const outcome = await this.executor.run(source, this.signal);
    switch (outcome.status) {
      case "failed": {
        if (!(await fileExists(source))) {
          this.ledger.forget(source);
          break;
        }
        const now = this.clock();
        const retryAt = this.ledger.recordFailure(source, now);
        this.logger.warn("backing off", {
          file: path.basename(source),
          retryInMs: retryAt - now,
        });
        break;
      }
      case "done":
      case "skipped":
        this.ledger.forget(source);
        break;
      case "aborted":
        break;
    }
  }
}
