// src/daemon.ts

import { mkdir } from "node:fs/promises";
import type { Command } from "commander";
import { ledgerFromConfig, type BackoffLedger } from "./backoff.js";
import {
  HttpCompressorClient,
  type CompressorClient,
} from "./compressor-client.js";
import type {
  ConfigKey,
  ConfigOverrides,
  HotfolderConfig,
} from "./config.js";
import { collectIgnoreOption } from "./ignore.js";
import { LocalIoError } from "./errors.js";
import { ConcurrencyGovernor } from "./governor.js";
import { JobExecutor } from "./job.js";
import { NullLogger, type Logger } from "./logger.js";
import { OutputNamer } from "./output-path.js";
import { ReadinessDetector } from "./readiness.js";
import { ScanLoop } from "./scan-loop.js";
import { deletionStrategy, type DeletionStrategy } from "./secure-delete.js";
import { Transport } from "./transport.js";
import { linkedController } from "./util.js";

export type RunCommandOptions = {
  apiUrl?: string;
  inputDir?: string;
  outputDir?: string;
  maxConcurrentJobs?: string;
  pollInterval?: string;
  readyMinAge?: string;
  requestTimeout?: string;
  streamReadTimeout?: string;
  downloadReadTimeout?: string;
  targetSizeMb?: string;
  downloadWait?: string;
  secureDelete?: boolean;
  failureBackoff?: string;
  maxFailureBackoff?: string;
  ignore?: string[];
};

// ---------- CLI ----------
export function configureRunCommand(command: Command): Command {
  return command
    .description(
      "watch the input folder and send every settled file to the compression service",
    )
    .option("--api-url <url>", "base URL of the compression service")
    .option("--input-dir <dir>", "folder to watch")
    .option("--output-dir <dir>", "folder for compressed results")
    .option(
      "-j, --max-concurrent-jobs <n>",
      "upper bound on files processed at once",
    )
    .option("--poll-interval <seconds>", "seconds between folder scans")
    .option(
      "--ready-min-age <seconds>",
      "a file must be unchanged for this long before it is picked up",
    )
    .option(
      "--request-timeout <seconds>",
      "deadline for connecting, sending and receiving response headers",
    )
    .option(
      "--stream-read-timeout <seconds>",
      "max silence on the progress stream",
    )
    .option(
      "--download-read-timeout <seconds>",
      "max silence while downloading the result",
    )
    .option("--target-size-mb <mb>", "target_size_mb sent with each upload")
    .option(
      "--download-wait <seconds>",
      "server-side wait for the artifact on download",
    )
    .option(
      "--secure-delete",
      "overwrite sources with shred before removing them (best effort)",
    )
    .option(
      "--failure-backoff <seconds>",
      "cooldown before a failed file is retried",
    )
    .option(
      "--max-failure-backoff <seconds>",
      "cap for the cooldown; larger than --failure-backoff makes it double per failure",
    )
    .option(
      "-i, --ignore <pattern>",
      "gitignore-style ignore rule (repeat or comma-separated)",
      collectIgnoreOption,
    );
}

/** Map CLI flags onto the environment variable names config.ts reads. */
export function cliOptsToOverrides(opts: RunCommandOptions): ConfigOverrides {
  const pairs: Array<[ConfigKey, string | undefined]> = [
    ["API_URL", opts.apiUrl],
    ["INPUT_DIR", opts.inputDir],
    ["OUTPUT_DIR", opts.outputDir],
    ["MAX_CONCURRENT_JOBS", opts.maxConcurrentJobs],
    ["POLL_INTERVAL_S", opts.pollInterval],
    ["READY_MIN_AGE_S", opts.readyMinAge],
    ["REQUEST_TIMEOUT_S", opts.requestTimeout],
    ["STREAM_READ_TIMEOUT_S", opts.streamReadTimeout],
    ["DOWNLOAD_READ_TIMEOUT_S", opts.downloadReadTimeout],
    ["UPLOAD_TARGET_SIZE_MB", opts.targetSizeMb],
    ["DOWNLOAD_WAIT_S", opts.downloadWait],
    ["SECURE_DELETE", opts.secureDelete ? "true" : undefined],
    ["FAILURE_BACKOFF_S", opts.failureBackoff],
    ["MAX_FAILURE_BACKOFF_S", opts.maxFailureBackoff],
    ["IGNORE", opts.ignore?.length ? opts.ignore.join(",") : undefined],
  ];
  const out: ConfigOverrides = {};
  for (const [key, value] of pairs) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export type DaemonParts = {
  detector: ReadinessDetector;
  ledger: BackoffLedger;
  governor: ConcurrencyGovernor;
  namer: OutputNamer;
  executor: JobExecutor;
  loop: ScanLoop;
};

export type DaemonDeps = {
  signal: AbortSignal;
  logger?: Logger;
  client?: CompressorClient;
  deletion?: DeletionStrategy;
  fetchImpl?: typeof fetch;
  clock?: () => number;
};

/** Wire every component from a validated config. */
export function createDaemon(
  config: HotfolderConfig,
  deps: DaemonDeps,
): DaemonParts {
  const logger = deps.logger ?? new NullLogger();
  const client =
    deps.client ??
    new HttpCompressorClient({
      baseUrl: config.apiUrl,
      transport: new Transport({
        requestTimeoutMs: config.requestTimeoutMs,
        logger: logger.child("http"),
        fetchImpl: deps.fetchImpl,
      }),
      streamReadTimeoutMs: config.streamReadTimeoutMs,
      downloadReadTimeoutMs: config.downloadReadTimeoutMs,
      downloadWaitS: config.downloadWaitS,
    });

  const detector = new ReadinessDetector({
    root: config.inputDir,
    minAgeMs: config.readyMinAgeMs,
    ignoreRules: config.ignoreRules,
    logger: logger.child("scan"),
  });
  const ledger = ledgerFromConfig(config);
  const governor = new ConcurrencyGovernor(config.maxConcurrentJobs, {
    logger: logger.child("governor"),
  });
  const namer = new OutputNamer(config.outputDir);
  const executor = new JobExecutor({
    client,
    namer,
    deletion:
      deps.deletion ??
      deletionStrategy(config.secureDelete, logger.child("delete")),
    uploadTargetSizeMb: config.uploadTargetSizeMb,
    logger: logger.child("job"),
  });
  const loop = new ScanLoop({
    detector,
    ledger,
    governor,
    executor,
    signal: deps.signal,
    pollIntervalMs: config.pollIntervalMs,
    clock: deps.clock,
    logger: logger.child("scan"),
  });
  return { detector, ledger, governor, namer, executor, loop };
}

async function ensureDirs(config: HotfolderConfig): Promise<void> {
  for (const dir of [config.inputDir, config.outputDir]) {
    try {
      await mkdir(dir, { recursive: true });
    } catch (err) {
      throw new LocalIoError(
        `cannot create ${dir}: ${err instanceof Error ? err.message : String(err)}`,
        dir,
        err,
      );
    }
  }
}

/**
 * Run until `signal` aborts, then wait for in-flight jobs to abandon their
 * work. Without a signal, SIGINT and SIGTERM trigger the shutdown.
 */
/** Where SIGINT/SIGTERM are heard when no shutdown signal is passed in. */
export interface SignalSource {
  once(event: NodeJS.Signals, listener: (sig: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (sig: NodeJS.Signals) => void): unknown;
}

export async function runDaemon(
  config: HotfolderConfig,
  opts: { logger?: Logger; signal?: AbortSignal; signals?: SignalSource } = {},
): Promise<void> {
  const logger = opts.logger ?? new NullLogger();
  const signals = opts.signals ?? process;
  const { controller, dispose } = linkedController(opts.signal);

  const onSig = (sig: NodeJS.Signals) => {
    logger.info("shutdown requested", { signal: sig });
    controller.abort();
  };
  if (!opts.signal) {
    signals.once("SIGINT", onSig);
    signals.once("SIGTERM", onSig);
  }

  try {
    await ensureDirs(config);
    const { loop, governor } = createDaemon(config, {
      signal: controller.signal,
      logger,
    });
    logger.info("starting", {
      apiUrl: config.apiUrl,
      outputDir: config.outputDir,
      maxConcurrentJobs: config.maxConcurrentJobs,
      secureDelete: config.secureDelete,
    });
    await loop.run();
    await governor.drain();
    logger.info("stopped");
  } finally {
    dispose();
    signals.off("SIGINT", onSig);
    signals.off("SIGTERM", onSig);
  }
}
