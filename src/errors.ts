// src/errors.ts

export type ErrorKind =
  | "transient-network"
  | "remote-rejection"
  | "protocol-violation"
  | "remote-job"
  | "local-io"
  | "aborted"
  | "config";

export class HotfolderError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = "HotfolderError";
  }
}

/** Connection refused/reset, timeouts, 5xx and 429 once retries ran out. */
export class TransientNetworkError extends HotfolderError {
  readonly status?: number;
  readonly url?: string;
  readonly isTimeout: boolean;
  // from Retry-After on 429
  readonly retryDelayMs?: number;

  constructor(
    message: string,
    opts: {
      status?: number;
      url?: string;
      isTimeout?: boolean;
      retryDelayMs?: number;
      cause?: unknown;
    } = {},
  ) {
    super("transient-network", message, { cause: opts.cause });
    this.name = "TransientNetworkError";
    this.status = opts.status;
    this.url = opts.url;
    this.isTimeout = opts.isTimeout ?? false;
    this.retryDelayMs = opts.retryDelayMs;
  }
}

export class RemoteRejectionError extends HotfolderError {
  readonly status: number;
  readonly url: string;
  readonly body: string;

  constructor(status: number, url: string, body: string) {
    super(
      "remote-rejection",
      `request rejected with ${status}${body ? `: ${body}` : ""}`,
    );
    this.name = "RemoteRejectionError";
    this.status = status;
    this.url = url;
    this.body = body;
  }
}

export class ProtocolViolationError extends HotfolderError {
  constructor(message: string) {
    super("protocol-violation", message);
    this.name = "ProtocolViolationError";
  }
}

/** The remote service reported `{"type":"error"}` for the task. */
export class RemoteJobError extends HotfolderError {
  readonly remoteMessage: string;

  constructor(remoteMessage: string) {
    super("remote-job", `remote job failed: ${remoteMessage}`);
    this.name = "RemoteJobError";
    this.remoteMessage = remoteMessage;
  }
}

export class LocalIoError extends HotfolderError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super("local-io", message, { cause });
    this.name = "LocalIoError";
    this.path = path;
  }
}

/** Cancellation. Not a failure: no backoff, source kept. */
export class JobAbortedError extends HotfolderError {
  readonly stage: string;

  constructor(stage: string) {
    super("aborted", `aborted during ${stage}`);
    this.name = "JobAbortedError";
    this.stage = stage;
  }
}

export class ConfigError extends HotfolderError {
  constructor(message: string) {
    super("config", message);
    this.name = "ConfigError";
  }
}

export function isHotfolderError(err: unknown): err is HotfolderError {
  return err instanceof HotfolderError;
}

const MAX_BODY_SNIPPET = 300;

export function truncateBody(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > MAX_BODY_SNIPPET
    ? `${trimmed.slice(0, MAX_BODY_SNIPPET)}…`
    : trimmed;
}
