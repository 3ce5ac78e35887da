// src/output-path.ts
import { link, mkdir, rename } from "node:fs/promises";
import path from "node:path";
import {
  MAX_OUTPUT_NAME_ATTEMPTS,
  OUTPUT_SUFFIX,
  PART_EXTENSION,
} from "./constants.js";
import { LocalIoError } from "./errors.js";
import { errnoCode, fileExists } from "./util.js";

export function outputBaseName(sourcePath: string, container: string): {
  stem: string;
  ext: string;
} {
  const parsed = path.parse(sourcePath);
  const ext = container.startsWith(".") ? container : `.${container}`;
  return { stem: `${parsed.name}${OUTPUT_SUFFIX}`, ext };
}

/** `stem.ext`, then `stem_2.ext`, `stem_3.ext`, ... */
export function candidateName(stem: string, ext: string, n: number): string {
  return n <= 1 ? `${stem}${ext}` : `${stem}_${n}${ext}`;
}

export function partPathFor(finalPath: string): string {
  return `${finalPath}${PART_EXTENSION}`;
}

// link() reports these when hard links are not supported by the filesystem
const NO_LINK_CODES = new Set([
  "EPERM",
  "ENOTSUP",
  "EOPNOTSUPP",
  "EXDEV",
  "ENOSYS",
]);

/**
 * Picks collision-free output names. Names handed out to in-flight jobs are
 * reserved in memory so two jobs with the same stem never pick the same
 * file, and the final commit refuses to overwrite anything that appeared on
 * disk in the meantime.
 */
export class OutputNamer {
  readonly dir: string;
  private readonly reserved = new Set<string>();
  private readonly maxAttempts: number;

  constructor(dir: string, opts: { maxAttempts?: number } = {}) {
    this.dir = path.resolve(dir);
    this.maxAttempts = opts.maxAttempts ?? MAX_OUTPUT_NAME_ATTEMPTS;
  }

  async ensureDir(): Promise<void> {
    try {
      await mkdir(this.dir, { recursive: true });
    } catch (err) {
      throw new LocalIoError(
        `cannot create output directory: ${err instanceof Error ? err.message : String(err)}`,
        this.dir,
        err,
      );
    }
  }

  /**
   * Reserve the first candidate that is neither on disk nor held by another
   * job. Call `release` once the job is done with it.
   */
  async reserve(stem: string, ext: string, from = 1): Promise<string> {
    await this.ensureDir();
    for (let n = Math.max(1, from); n <= this.maxAttempts; n++) {
      const candidate = path.join(this.dir, candidateName(stem, ext, n));
      if (this.reserved.has(candidate)) continue;
      if (await fileExists(candidate)) continue;
      // another job may have taken it while we awaited the stat
      if (this.reserved.has(candidate)) continue;
      this.reserved.add(candidate);
      return candidate;
    }
    throw new LocalIoError(
      `refusing to overwrite existing outputs for ${stem}${ext}`,
      path.join(this.dir, candidateName(stem, ext, 1)),
    );
  }

  release(finalPath: string): void {
    this.reserved.delete(finalPath);
  }

  /**
   * Publish `tmpPath` at `finalPath` without overwriting: a hard link fails
   * with EEXIST if the name was taken meanwhile, in which case the next free
   * candidate is reserved and tried. Where hard links are unsupported this
   * falls back to check-then-rename. The caller removes `tmpPath` afterwards.
   * Returns the path the artifact ended up at.
   */
  async commit(
    tmpPath: string,
    finalPath: string,
    stem: string,
    ext: string,
  ): Promise<string> {
    let target = finalPath;
    const next = async () => {
      this.release(target);
      const from = this.indexOf(target, stem, ext) + 1;
      target = await this.reserve(stem, ext, from);
    };
    while (true) {
      try {
        await link(tmpPath, target);
        return target;
      } catch (err) {
        const code = errnoCode(err);
        if (code === "EEXIST") {
          await next();
          continue;
        }
        if (code && NO_LINK_CODES.has(code)) {
          if (await fileExists(target)) {
            await next();
            continue;
          }
          await rename(tmpPath, target);
          return target;
        }
        this.release(target);
        throw new LocalIoError(
          `cannot move download into place: ${err instanceof Error ? err.message : String(err)}`,
          target,
          err,
        );
      }
    }
  }

  private indexOf(target: string, stem: string, ext: string): number {
    const base = path.basename(target);
    if (base === `${stem}${ext}`) return 1;
    const middle = base.slice(stem.length, base.length - ext.length);
    const m = middle.match(/^_(\d+)$/);
    return m ? Number(m[1]) : 1;
  }
}
