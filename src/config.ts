// src/config.ts
import path from "node:path";
import { ConfigError } from "./errors.js";
import { DEFAULT_IGNORE_RULES, ENV_PREFIX } from "./constants.js";
import { normalizeIgnorePatterns } from "./ignore.js";
import { parseLogLevel, type LogLevel } from "./logger.js";

export type HotfolderConfig = {
  apiUrl: string;
  inputDir: string;
  outputDir: string;
  maxConcurrentJobs: number;
  pollIntervalMs: number;
  readyMinAgeMs: number;
  requestTimeoutMs: number;
  streamReadTimeoutMs: number;
  downloadReadTimeoutMs: number;
  uploadTargetSizeMb: number;
  downloadWaitS: number;
  secureDelete: boolean;
  failureBackoffMs: number;
  maxFailureBackoffMs: number;
  ignoreRules: string[];
  logLevel: LogLevel;
};

type Range = { min: number; max: number };

export const configCaps = {
  maxConcurrentJobs: { min: 1, max: 64 },
  pollIntervalS: { min: 0.1, max: 3600 },
  readyMinAgeS: { min: 0, max: 86_400 },
  requestTimeoutS: { min: 1, max: 3600 },
  readTimeoutS: { min: 1, max: 86_400 },
  uploadTargetSizeMb: { min: 0.1, max: 1_000_000 },
  downloadWaitS: { min: 0, max: 3600 },
  failureBackoffS: { min: 0, max: 86_400 },
} as const;

export const DEFAULT_API_URL = "http://localhost:8001/api";

/**
 * Environment variable names, without the HOTFOLDER_ prefix. CLI flags are
 * translated to the same names so both go through one validator.
 */
export type ConfigKey =
  | "API_URL"
  | "INPUT_DIR"
  | "OUTPUT_DIR"
  | "MAX_CONCURRENT_JOBS"
  | "POLL_INTERVAL_S"
  | "READY_MIN_AGE_S"
  | "REQUEST_TIMEOUT_S"
  | "STREAM_READ_TIMEOUT_S"
  | "DOWNLOAD_READ_TIMEOUT_S"
  | "UPLOAD_TARGET_SIZE_MB"
  | "DOWNLOAD_WAIT_S"
  | "SECURE_DELETE"
  | "FAILURE_BACKOFF_S"
  | "MAX_FAILURE_BACKOFF_S"
  | "IGNORE"
  | "LOG_LEVEL";

export type ConfigOverrides = Partial<Record<ConfigKey, string>>;

const envName = (key: ConfigKey) => `${ENV_PREFIX}${key}`;

function readRaw(
  env: NodeJS.ProcessEnv,
  overrides: ConfigOverrides,
  key: ConfigKey,
): string | undefined {
  const raw = overrides[key] ?? env[envName(key)];
  if (raw == null || raw.trim() === "") return undefined;
  return raw.trim();
}

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigError(
      `${name} must be a valid absolute http/https URL. Received: ${value}`,
    );
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(
      `${name} must use http or https scheme. Received: ${value}`,
    );
  }
  return value.replace(/\/+$/, "");
};

function parseNumberInRange(
  name: string,
  raw: string,
  range: Range,
  integer: boolean,
): number {
  const value = Number(raw);
  const valid = integer ? Number.isInteger(value) : Number.isFinite(value);
  if (!valid || value < range.min || value > range.max) {
    throw new ConfigError(
      `${name}=${raw} is out of allowed range [${range.min}..${range.max}]`,
    );
  }
  return value;
}

const TRUE_VALUES = new Set(["1", "true", "yes", "y", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "n", "off"]);

export function parseBool(name: string, raw: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new ConfigError(`${name}=${raw} is not a boolean`);
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
  cwd: string = process.cwd(),
): HotfolderConfig {
  const raw = (key: ConfigKey) => readRaw(env, overrides, key);
  const seconds = (key: ConfigKey, range: Range, fallbackS: number) => {
    const value = raw(key);
    const s =
      value == null
        ? fallbackS
        : parseNumberInRange(envName(key), value, range, false);
    return Math.round(s * 1000);
  };

  const apiUrl = validateHttpUrl(
    envName("API_URL"),
    raw("API_URL") ?? DEFAULT_API_URL,
  );
  const inputDir = path.resolve(
    cwd,
    raw("INPUT_DIR") ?? path.join("hotfolder", "input"),
  );
  const outputDir = path.resolve(
    cwd,
    raw("OUTPUT_DIR") ?? path.join("hotfolder", "output"),
  );
  if (inputDir === outputDir) {
    throw new ConfigError(
      `${envName("INPUT_DIR")} and ${envName("OUTPUT_DIR")} must differ (${inputDir})`,
    );
  }

  const maxJobsRaw = raw("MAX_CONCURRENT_JOBS");
  const maxConcurrentJobs =
    maxJobsRaw == null
      ? 5
      : parseNumberInRange(
          envName("MAX_CONCURRENT_JOBS"),
          maxJobsRaw,
          configCaps.maxConcurrentJobs,
          true,
        );

  const targetRaw = raw("UPLOAD_TARGET_SIZE_MB");
  const uploadTargetSizeMb =
    targetRaw == null
      ? 50
      : parseNumberInRange(
          envName("UPLOAD_TARGET_SIZE_MB"),
          targetRaw,
          configCaps.uploadTargetSizeMb,
          false,
        );

  const waitRaw = raw("DOWNLOAD_WAIT_S");
  const downloadWaitS =
    waitRaw == null
      ? 2
      : parseNumberInRange(
          envName("DOWNLOAD_WAIT_S"),
          waitRaw,
          configCaps.downloadWaitS,
          false,
        );

  const secureRaw = raw("SECURE_DELETE");
  const secureDelete =
    secureRaw == null ? false : parseBool(envName("SECURE_DELETE"), secureRaw);

  const failureBackoffMs = seconds(
    "FAILURE_BACKOFF_S",
    configCaps.failureBackoffS,
    30,
  );
  const maxFailureBackoffMs = Math.max(
    failureBackoffMs,
    seconds(
      "MAX_FAILURE_BACKOFF_S",
      configCaps.failureBackoffS,
      failureBackoffMs / 1000,
    ),
  );

  const ignoreRaw = raw("IGNORE");
  const ignoreRules = normalizeIgnorePatterns(
    ignoreRaw == null ? DEFAULT_IGNORE_RULES : ignoreRaw.split(","),
  );

  return {
    apiUrl,
    inputDir,
    outputDir,
    maxConcurrentJobs,
    pollIntervalMs: seconds("POLL_INTERVAL_S", configCaps.pollIntervalS, 5),
    readyMinAgeMs: seconds("READY_MIN_AGE_S", configCaps.readyMinAgeS, 4),
    requestTimeoutMs: seconds(
      "REQUEST_TIMEOUT_S",
      configCaps.requestTimeoutS,
      60,
    ),
    streamReadTimeoutMs: seconds(
      "STREAM_READ_TIMEOUT_S",
      configCaps.readTimeoutS,
      600,
    ),
    downloadReadTimeoutMs: seconds(
      "DOWNLOAD_READ_TIMEOUT_S",
      configCaps.readTimeoutS,
      300,
    ),
    uploadTargetSizeMb,
    downloadWaitS,
    secureDelete,
    failureBackoffMs,
    maxFailureBackoffMs,
    ignoreRules,
    logLevel: parseLogLevel(raw("LOG_LEVEL"), "info"),
  };
}

/** Config as printed by `hotfolder config`, with seconds for durations. */
export function describeConfig(cfg: HotfolderConfig): Record<string, unknown> {
  return {
    apiUrl: cfg.apiUrl,
    inputDir: cfg.inputDir,
    outputDir: cfg.outputDir,
    maxConcurrentJobs: cfg.maxConcurrentJobs,
    pollIntervalS: cfg.pollIntervalMs / 1000,
    readyMinAgeS: cfg.readyMinAgeMs / 1000,
    requestTimeoutS: cfg.requestTimeoutMs / 1000,
    streamReadTimeoutS: cfg.streamReadTimeoutMs / 1000,
    downloadReadTimeoutS: cfg.downloadReadTimeoutMs / 1000,
    uploadTargetSizeMb: cfg.uploadTargetSizeMb,
    downloadWaitS: cfg.downloadWaitS,
    secureDelete: cfg.secureDelete,
    failureBackoffS: cfg.failureBackoffMs / 1000,
    maxFailureBackoffS: cfg.maxFailureBackoffMs / 1000,
    ignore: cfg.ignoreRules,
    logLevel: cfg.logLevel,
  };
}
