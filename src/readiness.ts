// src/readiness.ts
import { lstat, readdir } from "node:fs/promises";
import path from "node:path";
import { createIgnorer, isHiddenName, type Ignorer } from "./ignore.js";
import type { Logger } from "./logger.js";
import { isNotFound } from "./util.js";

export type FileObservation = {
  path: string;
  size: number;
  mtimeMs: number;
};

export type Readiness = "unstable" | "ready" | "claimed";

export type ReadinessReport = {
  // present candidates, in listing order
  files: Array<FileObservation & { readiness: Readiness }>;
  ready: string[];
  vanished: string[];
};

export type ReadinessOptions = {
  root: string;
  minAgeMs: number;
  ignoreRules?: readonly string[];
  logger?: Logger;
};

type SnapshotEntry = { size: number; mtimeMs: number };

/**
 * Decides when a file in the input directory has stopped changing.
 *
 * A single stat cannot tell an in-progress copy from a finished one, so a
 * path is ready only when two consecutive scans saw the same (size, mtime)
 * and the mtime is at least `minAgeMs` in the past. Any difference between
 * scans, including an mtime that moved backwards, restarts the count.
 */
export class ReadinessDetector {
  readonly root: string;
  private readonly minAgeMs: number;
  private readonly ignorer: Ignorer;
  private readonly logger?: Logger;
  private snapshot = new Map<string, SnapshotEntry>();

  constructor({ root, minAgeMs, ignoreRules = [], logger }: ReadinessOptions) {
    this.root = path.resolve(root);
    this.minAgeMs = minAgeMs;
    this.ignorer = createIgnorer(ignoreRules);
    this.logger = logger;
  }

  isCandidateName(name: string): boolean {
    return !isHiddenName(name) && !this.ignorer.ignoresFile(name);
  }

  /**
   * List regular, non-hidden, non-ignored files with their current size and
   * mtime. Entries that vanish between readdir and lstat are dropped.
   */
  async list(): Promise<FileObservation[]> {
    const entries = await readdir(this.root, { withFileTypes: true });
    const out: FileObservation[] = [];
    for (const entry of entries) {
      if (!entry.isFile() || !this.isCandidateName(entry.name)) continue;
      const abs = path.join(this.root, entry.name);
      try {
        const st = await lstat(abs);
        if (!st.isFile()) continue;
        out.push({ path: abs, size: st.size, mtimeMs: st.mtimeMs });
      } catch (err) {
        if (isNotFound(err)) {
          this.logger?.debug("entry vanished before stat", { path: abs });
          continue;
        }
        throw err;
      }
    }
    return out;
  }

  /**
   * Compare `current` against the previous snapshot, then make `current` the
   * new snapshot. Pure apart from the snapshot update, so tests can drive it
   * with synthetic observations.
   */
  observe(
    current: readonly FileObservation[],
    now: number,
    isClaimed: (path: string) => boolean = () => false,
  ): ReadinessReport {
    const next = new Map<string, SnapshotEntry>();
    const files: ReadinessReport["files"] = [];
    const ready: string[] = [];

    for (const obs of current) {
      const prev = this.snapshot.get(obs.path);
      next.set(obs.path, { size: obs.size, mtimeMs: obs.mtimeMs });

      let readiness: Readiness;
      if (isClaimed(obs.path)) {
        readiness = "claimed";
      } else if (
        prev != null &&
        prev.size === obs.size &&
        prev.mtimeMs === obs.mtimeMs &&
        now - obs.mtimeMs >= this.minAgeMs
      ) {
        readiness = "ready";
        ready.push(obs.path);
      } else {
        readiness = "unstable";
      }
      files.push({ ...obs, readiness });
    }

    const vanished: string[] = [];
    for (const known of this.snapshot.keys()) {
      if (!next.has(known)) vanished.push(known);
    }
    this.snapshot = next;

    return { files, ready, vanished };
  }

  async scan(
    now: number,
    isClaimed?: (path: string) => boolean,
  ): Promise<ReadinessReport> {
    const current = await this.list();
    return this.observe(current, now, isClaimed);
  }

  get tracked(): number {
    return this.snapshot.size;
  }
}
