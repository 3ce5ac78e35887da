// src/job.ts
import { open, unlink } from "node:fs/promises";
import path from "node:path";
import {
  DEFAULT_COMPRESS_SETTINGS,
  type CompressorClient,
  type CompressSettings,
} from "./compressor-client.js";
import {
  isHotfolderError,
  JobAbortedError,
  LocalIoError,
  ProtocolViolationError,
  RemoteJobError,
  type ErrorKind,
} from "./errors.js";
import { describeError, NullLogger, type Logger } from "./logger.js";
import { outputBaseName, partPathFor, type OutputNamer } from "./output-path.js";
import type { DeleteResult, DeletionStrategy } from "./secure-delete.js";
import { fileExists, isNotFound, throwIfAborted } from "./util.js";

export type JobStage =
  | "uploading"
  | "compressing"
  | "streaming"
  | "downloading"
  | "cleaning-up";

export type JobIds = {
  jobId?: string;
  taskId?: string;
};

export type JobOutcome =
  | ({
      status: "done";
      source: string;
      outputPath: string;
      deleted: DeleteResult;
    } & JobIds)
  | ({
      status: "failed";
      source: string;
      stage: JobStage;
      kind: ErrorKind | "unexpected";
      message: string;
    } & JobIds)
  | ({ status: "aborted"; source: string; stage: JobStage } & JobIds)
  | { status: "skipped"; source: string; reason: string };

export type JobExecutorOptions = {
  client: CompressorClient;
  namer: OutputNamer;
  deletion: DeletionStrategy;
  uploadTargetSizeMb: number;
  settings?: CompressSettings;
  logger?: Logger;
};

/**
 * Drives one source file through upload, compress, stream-wait, download
 * and cleanup. Never throws: every ending is reported as a JobOutcome.
 *
 * The source is deleted only after the artifact has been committed to its
 * final name. Failures and aborts leave the source in place and remove the
 * partial `.part` download.
 */
export class JobExecutor {
  private readonly client: CompressorClient;
  private readonly namer: OutputNamer;
  private readonly deletion: DeletionStrategy;
  private readonly uploadTargetSizeMb: number;
  private readonly settings: CompressSettings;
  private readonly logger: Logger;

  constructor(opts: JobExecutorOptions) {
    this.client = opts.client;
    this.namer = opts.namer;
    this.deletion = opts.deletion;
    this.uploadTargetSizeMb = opts.uploadTargetSizeMb;
    this.settings = opts.settings ?? { ...DEFAULT_COMPRESS_SETTINGS };
    this.logger = opts.logger ?? new NullLogger();
  }

  async run(source: string, signal: AbortSignal): Promise<JobOutcome> {
    const file = path.basename(source);
    const ids: JobIds = {};
    const meta = () => ({ file, ...ids });
    let stage: JobStage = "uploading";
    let reserved: string | undefined;
    let tmpPath: string | undefined;
    let committed = false;

    const enter = (next: JobStage) => {
      stage = next;
      this.logger.info(next, meta());
    };

    try {
      if (!(await fileExists(source))) {
        this.logger.info("skip: source is gone", { file });
        return { status: "skipped", source, reason: "missing" };
      }

      throwIfAborted(signal, stage);
      enter("uploading");
      const uploaded = await this.client.upload(
        { filePath: source, targetSizeMb: this.uploadTargetSizeMb },
        signal,
      );
      ids.jobId = uploaded.jobId;
      this.logger.info("upload complete", meta());

      throwIfAborted(signal, stage);
      enter("compressing");
      ids.taskId = await this.client.startCompression(
        {
          filename: uploaded.filename,
          jobId: uploaded.jobId,
          targetSizeMb: this.uploadTargetSizeMb,
          settings: this.settings,
        },
        signal,
      );
      this.logger.info("compression started", meta());

      throwIfAborted(signal, stage);
      enter("streaming");
      await this.waitForDone(ids.taskId, signal, meta);

      throwIfAborted(signal, stage);
      enter("downloading");
      const { stem, ext } = outputBaseName(source, this.settings.container);
      reserved = await this.namer.reserve(stem, ext);
      tmpPath = partPathFor(reserved);
      const bytes = await this.downloadTo(ids.taskId, tmpPath, signal);
      const outputPath = await this.namer.commit(tmpPath, reserved, stem, ext);
      reserved = outputPath;
      committed = true;
      this.logger.info("saved", { ...meta(), output: outputPath, bytes });

      // the artifact is committed; cleanup runs to completion even if a
      // shutdown was requested meanwhile
      enter("cleaning-up");
      const deleted = await this.deletion.delete(source);
      this.logger.info("source removed", {
        ...meta(),
        method: deleted.method,
        strategy: this.deletion.name,
      });

      return { status: "done", source, outputPath, deleted, ...ids };
    } catch (err) {
      // past the commit only a real abort error counts as one
      if (err instanceof JobAbortedError || (signal.aborted && !committed)) {
        this.logger.info("aborted; source kept", { ...meta(), stage });
        return { status: "aborted", source, stage, ...ids };
      }
      this.logger.error("failed; source kept", {
        ...meta(),
        stage,
        ...describeError(err),
      });
      return {
        status: "failed",
        source,
        stage,
        kind: isHotfolderError(err) ? err.kind : "unexpected",
        message: err instanceof Error ? err.message : String(err),
        ...ids,
      };
    } finally {
      if (tmpPath) await this.removePart(tmpPath);
      if (reserved) this.namer.release(reserved);
    }
  }

  private async waitForDone(
    taskId: string,
    signal: AbortSignal,
    meta: () => Record<string, unknown>,
  ): Promise<void> {
    for await (const event of this.client.events(taskId, signal)) {
      throwIfAborted(signal, "streaming");
      switch (event.type) {
        case "done":
          this.logger.info("remote job done", meta());
          return;
        case "error":
          throw new RemoteJobError(event.message);
        case "progress":
          this.logger.debug("progress", {
            ...meta(),
            progress: event.progress ?? null,
          });
          break;
        default:
          break;
      }
    }
    throwIfAborted(signal, "streaming");
    throw new ProtocolViolationError(
      "event stream ended without done or error",
    );
  }

  private async downloadTo(
    taskId: string,
    tmpPath: string,
    signal: AbortSignal,
  ): Promise<number> {
    const fh = await open(tmpPath, "w").catch((err: unknown) => {
      throw new LocalIoError(
        `cannot create ${path.basename(tmpPath)}: ${err instanceof Error ? err.message : String(err)}`,
        tmpPath,
        err,
      );
    });
    let bytes = 0;
    try {
      // the response is opened only once there is somewhere to write it
      const chunks = await this.client.download(taskId, signal);
      for await (const chunk of chunks) {
        throwIfAborted(signal, "downloading");
        try {
          await fh.write(chunk);
        } catch (err) {
          throw new LocalIoError(
            `write failed: ${err instanceof Error ? err.message : String(err)}`,
            tmpPath,
            err,
          );
        }
        bytes += chunk.byteLength;
      }
      throwIfAborted(signal, "downloading");
    } finally {
      await fh.close();
    }
    return bytes;
  }

  private async removePart(tmpPath: string): Promise<void> {
    try {
      await unlink(tmpPath);
    } catch (err) {
      if (isNotFound(err)) return;
      this.logger.warn("could not remove partial download", {
        path: tmpPath,
        ...describeError(err),
      });
    }
  }
}
