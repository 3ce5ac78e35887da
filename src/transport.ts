// src/transport.ts
import {
  isHotfolderError,
  JobAbortedError,
  ProtocolViolationError,
  RemoteRejectionError,
  TransientNetworkError,
  truncateBody,
} from "./errors.js";
import type { Logger } from "./logger.js";
import { retry } from "./retry.js";
import { linkedController } from "./util.js";

export type TransportOptions = {
  requestTimeoutMs: number;
  retries?: number;
  minRetryDelayMs?: number;
  maxRetryDelayMs?: number;
  jitterRatio?: number;
  logger?: Logger;
  fetchImpl?: typeof fetch;
};

type BodyFactory = (touch: () => void) => {
  body: RequestInit["body"];
  headers?: Record<string, string>;
  streaming?: boolean;
};

export type SendOptions = {
  method: "GET" | "POST";
  url: string;
  // a fresh body per attempt; `touch` resets the idle deadline while sending
  body?: BodyFactory;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  // idle timeout between body chunks once headers arrived
  readTimeoutMs?: number;
  // label for log lines and abort errors, e.g. "upload"
  label: string;
};

export interface OpenResponse {
  readonly status: number;
  readonly headers: Headers;
  chunks(): AsyncGenerator<Uint8Array>;
  text(): Promise<string>;
  json(): Promise<unknown>;
  close(): void;
}

/**
 * Keeps one abort deadline that callers push forward whenever bytes move.
 */
class IdleDeadline {
  private timer: NodeJS.Timeout | null = null;
  expired = false;

  constructor(
    private ms: number,
    private readonly onExpire: () => void,
  ) {}

  arm(ms: number = this.ms) {
    this.ms = ms;
    this.touch();
  }

  touch = () => {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.expired = true;
      this.onExpire();
    }, this.ms);
  };

  clear() {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }
}

function safeUrl(raw: string): string {
  try {
    const u = new URL(raw);
    return `${u.origin}${u.pathname}`;
  } catch {
    return raw;
  }
}

function parseRetryAfterMs(value: string | null): number | undefined {
  if (value && /^\d+$/.test(value.trim())) {
    return Number(value.trim()) * 1000;
  }
  return undefined;
}

/**
 * fetch with a short request deadline (connect, send, headers), a separate
 * idle deadline for reading long bodies, and retry of 429/5xx/network errors
 * before any body is handed to the caller.
 */
export class Transport {
  private readonly requestTimeoutMs: number;
  private readonly retries: number;
  private readonly minRetryDelayMs: number;
  private readonly maxRetryDelayMs: number;
  private readonly jitterRatio: number;
  private readonly logger?: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: TransportOptions) {
    this.requestTimeoutMs = opts.requestTimeoutMs;
    this.retries = opts.retries ?? 3;
    this.minRetryDelayMs = opts.minRetryDelayMs ?? 500;
    this.maxRetryDelayMs = opts.maxRetryDelayMs ?? 4000;
    this.jitterRatio = opts.jitterRatio ?? 0.2;
    this.logger = opts.logger;
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async send(opts: SendOptions): Promise<OpenResponse> {
    const url = safeUrl(opts.url);
    return retry(() => this.attempt(opts), {
      retries: this.retries,
      minDelayMs: this.minRetryDelayMs,
      maxDelayMs: this.maxRetryDelayMs,
      jitterRatio: this.jitterRatio,
      signal: opts.signal,
      shouldRetry: (err) => {
        if (!(err instanceof TransientNetworkError)) return false;
        if (err.status === 429) {
          return { retry: true, delayMs: err.retryDelayMs };
        }
        return true;
      },
      onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
        this.logger?.warn("http.retry", {
          label: opts.label,
          url,
          status:
            error instanceof TransientNetworkError
              ? (error.status ?? null)
              : null,
          attempt,
          maxAttempts,
          delayMs,
        });
      },
    });
  }

  async json(opts: SendOptions): Promise<unknown> {
    const res = await this.send(opts);
    return res.json();
  }

  private async attempt(opts: SendOptions): Promise<OpenResponse> {
    const { label, signal } = opts;
    const url = safeUrl(opts.url);
    if (signal?.aborted) throw new JobAbortedError(label);

    const { controller, dispose } = linkedController(signal);
    const deadline = new IdleDeadline(this.requestTimeoutMs, () =>
      controller.abort(),
    );
    const finish = () => {
      deadline.clear();
      dispose();
    };

    const mapError = (err: unknown): Error => {
      if (signal?.aborted) return new JobAbortedError(label);
      if (deadline.expired) {
        return new TransientNetworkError(`${label} timed out`, {
          url,
          isTimeout: true,
          cause: err,
        });
      }
      if (isHotfolderError(err)) return err;
      return new TransientNetworkError(
        `${label} failed: ${err instanceof Error ? err.message : String(err)}`,
        { url, cause: err },
      );
    };

    deadline.arm(this.requestTimeoutMs);
    const made = opts.body?.(deadline.touch);
    const init: RequestInit = {
      method: opts.method,
      headers: { ...opts.headers, ...made?.headers },
      signal: controller.signal,
    };
    if (made) {
      init.body = made.body;
      if (made.streaming) init.duplex = "half";
    }

    let res: Response;
    try {
      res = await this.fetchImpl(opts.url, init);
    } catch (err) {
      finish();
      throw mapError(err);
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      finish();
      const body = truncateBody(text);
      if (res.status === 429 || res.status >= 500) {
        throw new TransientNetworkError(`${label} failed with ${res.status}`, {
          status: res.status,
          url,
          retryDelayMs: parseRetryAfterMs(res.headers.get("retry-after")),
        });
      }
      throw new RemoteRejectionError(res.status, url, body);
    }

    // headers are in; from here on the deadline tracks body idleness
    deadline.arm(opts.readTimeoutMs ?? this.requestTimeoutMs);
    const body = res.body;
    let closed = false;
    const close = () => {
      if (closed) return;
      closed = true;
      finish();
      if (!controller.signal.aborted) controller.abort();
    };

    async function* chunks(): AsyncGenerator<Uint8Array> {
      if (!body) {
        close();
        return;
      }
      const reader = body.getReader();
      const readChunk = async () => {
        try {
          return await reader.read();
        } catch (err) {
          throw mapError(err);
        }
      };
      try {
        while (true) {
          const step = await readChunk();
          if (step.done) return;
          deadline.touch();
          yield step.value;
        }
      } finally {
        reader.releaseLock();
        close();
      }
    }

    const readAll = async (): Promise<string> => {
      const decoder = new TextDecoder();
      let out = "";
      for await (const chunk of chunks()) {
        out += decoder.decode(chunk, { stream: true });
      }
      return out + decoder.decode();
    };

    return {
      status: res.status,
      headers: res.headers,
      chunks,
      text: readAll,
      json: async () => {
        const text = await readAll();
        try {
          return JSON.parse(text);
        } catch {
          throw new ProtocolViolationError(
            `${label} returned invalid JSON: ${truncateBody(text)}`,
          );
        }
      },
      close,
    };
  }
}
