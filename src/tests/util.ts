import fsp from "node:fs/promises";
import os from "node:os";
import { join } from "node:path";
import {
  StructuredLogger,
  type LogEntry,
  type Logger,
} from "../logger";

export function wait(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

export async function fileExists(p: string) {
  try {
    await fsp.stat(p);
    return true;
  } catch {
    return false;
  }
}

export async function mkTmp(prefix = "hotfolder-test-"): Promise<string> {
  return fsp.mkdtemp(join(os.tmpdir(), prefix));
}

export type Dirs = { base: string; input: string; output: string };

export async function mkCase(tmpBase: string, name: string): Promise<Dirs> {
  const base = join(tmpBase, name);
  const input = join(base, "input");
  const output = join(base, "output");
  await fsp.mkdir(input, { recursive: true });
  await fsp.mkdir(output, { recursive: true });
  return { base, input, output };
}

/** A logger that keeps every entry in memory instead of echoing. */
export function captureLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({
    scope: "test",
    sink: (entry) => entries.push(entry),
  });
  return { logger, entries };
}

/** Poll `cond` until true or `timeoutMs` passes. */
export async function waitFor(
  cond: () => boolean | Promise<boolean>,
  timeoutMs = 5000,
  stepMs = 10,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await cond())) {
    if (Date.now() > deadline) throw new Error("waitFor: timed out");
    await wait(stepMs);
  }
}

export async function* chunksOf(
  ...parts: Array<string | Uint8Array>
): AsyncGenerator<Uint8Array> {
  for (const part of parts) {
    yield typeof part === "string" ? Buffer.from(part, "utf8") : part;
  }
}

export async function collect<T>(it: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const x of it) out.push(x);
  return out;
}
