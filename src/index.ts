export {
  loadConfig,
  describeConfig,
  DEFAULT_API_URL,
  type HotfolderConfig,
  type ConfigKey,
  type ConfigOverrides,
} from "./config.js";

export {
  runDaemon,
  createDaemon,
  cliOptsToOverrides,
  type DaemonParts,
  type DaemonDeps,
  type RunCommandOptions,
  type SignalSource,
} from "./daemon.js";

export {
  ReadinessDetector,
  type FileObservation,
  type Readiness,
  type ReadinessReport,
} from "./readiness.js";

export { BackoffLedger, ledgerFromConfig, type BackoffPolicy } from "./backoff.js";
export { ConcurrencyGovernor } from "./governor.js";

export {
  JobExecutor,
  type JobOutcome,
  type JobStage,
  type JobExecutorOptions,
} from "./job.js";

export { ScanLoop, type CycleReport, type JobRunner } from "./scan-loop.js";

export {
  HttpCompressorClient,
  DEFAULT_COMPRESS_SETTINGS,
  type CompressorClient,
  type CompressSettings,
  type UploadRequest,
  type UploadResult,
  type CompressRequest,
} from "./compressor-client.js";

export { Transport, type TransportOptions, type SendOptions } from "./transport.js";
export { taskEvents, type TaskEvent } from "./event-stream.js";
export { OutputNamer, outputBaseName, candidateName } from "./output-path.js";

export {
  PlainDeletion,
  ShredDeletion,
  deletionStrategy,
  type DeletionStrategy,
  type DeleteResult,
} from "./secure-delete.js";

export {
  HotfolderError,
  TransientNetworkError,
  RemoteRejectionError,
  ProtocolViolationError,
  RemoteJobError,
  LocalIoError,
  JobAbortedError,
  ConfigError,
  type ErrorKind,
} from "./errors.js";

export {
  ConsoleLogger,
  StructuredLogger,
  NullLogger,
  parseLogLevel,
  type Logger,
  type LogLevel,
  type LogEntry,
} from "./logger.js";
