// src/secure-delete.ts
import { spawn } from "node:child_process";
import { unlink } from "node:fs/promises";
import { LocalIoError } from "./errors.js";
import type { Logger } from "./logger.js";
import { fileExists, isNotFound } from "./util.js";

export type DeleteMethod = "unlink" | "shred" | "unlink-fallback" | "missing";

export type DeleteResult = {
  path: string;
  method: DeleteMethod;
};

export interface DeletionStrategy {
  readonly name: string;
  delete(path: string): Promise<DeleteResult>;
}

async function plainUnlink(
  path: string,
  method: DeleteMethod,
): Promise<DeleteResult> {
  try {
    await unlink(path);
    return { path, method };
  } catch (err) {
    if (isNotFound(err)) return { path, method: "missing" };
    throw new LocalIoError(
      `cannot delete source: ${err instanceof Error ? err.message : String(err)}`,
      path,
      err,
    );
  }
}

export class PlainDeletion implements DeletionStrategy {
  readonly name = "plain";

  delete(path: string): Promise<DeleteResult> {
    return plainUnlink(path, "unlink");
  }
}

function run(cmd: string, args: string[]): Promise<void> {
  return new Promise((res, rej) => {
    const p = spawn(cmd, args, { stdio: ["ignore", "ignore", "pipe"] });
    let errBuf = "";
    p.stderr.on("data", (d: Buffer) => (errBuf += d.toString()));
    p.on("error", rej);
    p.on("exit", (code) => {
      if (code === 0) return res();
      rej(new Error(`${cmd} exited ${code}${errBuf ? `: ${errBuf.trim()}` : ""}`));
    });
  });
}

/**
 * Overwrite-then-unlink via `shred -u`, falling back to a plain unlink when
 * shred is missing or fails.
 *
 * This is best effort only. On copy-on-write filesystems (btrfs, ZFS, APFS),
 * log-structured or journaling layers, FUSE/encrypted overlays, SSDs with
 * wear levelling and anything snapshotted or backed up, overwriting the file
 * in place does not reach the blocks that held the original data. Do not
 * rely on it as cryptographic erasure.
 */
export class ShredDeletion implements DeletionStrategy {
  readonly name = "shred";

  constructor(
    private readonly logger?: Logger,
    private readonly command = "shred",
  ) {}

  async delete(path: string): Promise<DeleteResult> {
    if (!(await fileExists(path))) return { path, method: "missing" };
    try {
      await run(this.command, ["-u", path]);
      if (!(await fileExists(path))) return { path, method: "shred" };
    } catch (err) {
      this.logger?.warn("secure delete failed; falling back to unlink", {
        path,
        error: err instanceof Error ? err.message : String(err),
      });
    }
    return plainUnlink(path, "unlink-fallback");
  }
}

export function deletionStrategy(
  secure: boolean,
  logger?: Logger,
): DeletionStrategy {
  return secure ? new ShredDeletion(logger) : new PlainDeletion();
}
