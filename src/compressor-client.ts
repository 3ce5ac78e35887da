// src/compressor-client.ts
import { open, type FileHandle } from "node:fs/promises";
import path from "node:path";
import { lookup } from "mime-types";
import { LocalIoError, ProtocolViolationError } from "./errors.js";
import { taskEvents, type TaskEvent } from "./event-stream.js";
import { multipartFileBody } from "./multipart.js";
import type { Transport } from "./transport.js";
import { isNotFound } from "./util.js";

export type CompressSettings = {
  video_codec: string;
  audio_codec: string;
  audio_bitrate_kbps: number;
  preset: string;
  tune: string;
  container: string;
  auto_resolution: boolean;
  force_hw_decode: boolean;
};

// quality mode: target_size_mb is sent because the API requires it
export const DEFAULT_COMPRESS_SETTINGS: Readonly<CompressSettings> = {
  video_codec: "av1_nvenc",
  audio_codec: "aac",
  audio_bitrate_kbps: 128,
  preset: "p6",
  tune: "hq",
  container: "mp4",
  auto_resolution: false,
  force_hw_decode: true,
};

export type UploadRequest = {
  filePath: string;
  targetSizeMb: number;
};

export type UploadResult = {
  // server-side name of the uploaded file
  filename: string;
  jobId: string;
};

export type CompressRequest = {
  filename: string;
  jobId: string;
  targetSizeMb: number;
  settings?: CompressSettings;
};

/**
 * The remote compression service as the job executor sees it.
 */
export interface CompressorClient {
  upload(req: UploadRequest, signal?: AbortSignal): Promise<UploadResult>;
  startCompression(req: CompressRequest, signal?: AbortSignal): Promise<string>;
  events(taskId: string, signal?: AbortSignal): AsyncIterable<TaskEvent>;
  download(
    taskId: string,
    signal?: AbortSignal,
  ): Promise<AsyncIterable<Uint8Array>>;
}

export type HttpCompressorClientOptions = {
  baseUrl: string;
  transport: Transport;
  streamReadTimeoutMs: number;
  downloadReadTimeoutMs: number;
  downloadWaitS: number;
};

export function guessContentType(filePath: string): string {
  return lookup(filePath) || "application/octet-stream";
}

function opaqueId(value: unknown): string | undefined {
  if (typeof value === "string" && value) return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

function field(body: unknown, name: string): unknown {
  if (typeof body !== "object" || body === null) return undefined;
  return name in body ? Reflect.get(body, name) : undefined;
}

export class HttpCompressorClient implements CompressorClient {
  private readonly baseUrl: string;
  private readonly transport: Transport;
  private readonly streamReadTimeoutMs: number;
  private readonly downloadReadTimeoutMs: number;
  private readonly downloadWaitS: number;

  constructor(opts: HttpCompressorClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.transport = opts.transport;
    this.streamReadTimeoutMs = opts.streamReadTimeoutMs;
    this.downloadReadTimeoutMs = opts.downloadReadTimeoutMs;
    this.downloadWaitS = opts.downloadWaitS;
  }

  private url(pathname: string, query?: Record<string, string>): string {
    const u = new URL(`${this.baseUrl}${pathname}`);
    for (const [k, v] of Object.entries(query ?? {})) {
      u.searchParams.set(k, v);
    }
    return u.toString();
  }

  async upload(req: UploadRequest, signal?: AbortSignal): Promise<UploadResult> {
    let fh: FileHandle;
    try {
      fh = await open(req.filePath, "r");
    } catch (err) {
      throw new LocalIoError(
        isNotFound(err)
          ? "source file disappeared before upload"
          : `cannot open source file: ${err instanceof Error ? err.message : String(err)}`,
        req.filePath,
        err,
      );
    }
    const filename = path.basename(req.filePath);
    const contentType = guessContentType(req.filePath);
    try {
      const res = await this.transport.json({
        method: "POST",
        label: "upload",
        url: this.url("/upload", {
          target_size_mb: String(req.targetSizeMb),
        }),
        signal,
        body: (touch) => {
          const multipart = multipartFileBody(
            {
              field: "file",
              filename,
              contentType,
              content: () =>
                fh.createReadStream({ start: 0, autoClose: false }),
            },
            { onChunk: touch },
          );
          return {
            body: multipart.body,
            headers: { "content-type": multipart.contentType },
            streaming: true,
          };
        },
      });
      const serverName = field(res, "filename");
      const jobId = opaqueId(field(res, "job_id"));
      if (typeof serverName !== "string" || !serverName || !jobId) {
        throw new ProtocolViolationError(
          "upload response is missing filename or job_id",
        );
      }
      return { filename: serverName, jobId };
    } finally {
      await fh.close();
    }
  }

  async startCompression(
    req: CompressRequest,
    signal?: AbortSignal,
  ): Promise<string> {
    const payload = {
      target_size_mb: req.targetSizeMb,
      ...(req.settings ?? DEFAULT_COMPRESS_SETTINGS),
      filename: req.filename,
      job_id: req.jobId,
    };
    const res = await this.transport.json({
      method: "POST",
      label: "compress",
      url: this.url("/compress"),
      signal,
      body: () => ({
        body: JSON.stringify(payload),
        headers: { "content-type": "application/json" },
      }),
    });
    const taskId = opaqueId(field(res, "task_id"));
    if (!taskId) {
      throw new ProtocolViolationError("compress response is missing task_id");
    }
    return taskId;
  }

  async *events(taskId: string, signal?: AbortSignal): AsyncGenerator<TaskEvent> {
    const res = await this.transport.send({
      method: "GET",
      label: "stream",
      url: this.url(`/stream/${encodeURIComponent(taskId)}`),
      headers: { accept: "text/event-stream" },
      readTimeoutMs: this.streamReadTimeoutMs,
      signal,
    });
    try {
      yield* taskEvents(res.chunks());
    } finally {
      res.close();
    }
  }

  async download(
    taskId: string,
    signal?: AbortSignal,
  ): Promise<AsyncIterable<Uint8Array>> {
    const res = await this.transport.send({
      method: "GET",
      label: "download",
      url: this.url(`/jobs/${encodeURIComponent(taskId)}/download`, {
        wait: String(this.downloadWaitS),
      }),
      readTimeoutMs: this.downloadReadTimeoutMs,
      signal,
    });
    return res.chunks();
  }
}
