// src/util.ts
import { stat } from "node:fs/promises";
import { JobAbortedError } from "./errors.js";

/**
 * Sleep for `ms`. When a signal is given the sleep ends early (resolving
 * `false`) as soon as it aborts; otherwise resolves `true`.
 */
export function wait(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  if (ms <= 0) return Promise.resolve(true);
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const code = err.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function isNotFound(err: unknown): boolean {
  return errnoCode(err) === "ENOENT";
}

export async function fileExists(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

export function throwIfAborted(signal: AbortSignal | undefined, stage: string) {
  if (signal?.aborted) throw new JobAbortedError(stage);
}

/**
 * An AbortController that follows `parent` and can additionally be aborted
 * on its own (e.g. by a timeout). Call `dispose()` when done so the parent
 * listener does not leak.
 */
export function linkedController(parent?: AbortSignal): {
  controller: AbortController;
  dispose: () => void;
} {
  const controller = new AbortController();
  if (!parent) return { controller, dispose: () => {} };
  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, dispose: () => {} };
  }
  const onAbort = () => controller.abort(parent.reason);
  parent.addEventListener("abort", onAbort, { once: true });
  return {
    controller,
    dispose: () => parent.removeEventListener("abort", onAbort),
  };
}
