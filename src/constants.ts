// src/constants.ts

export const CLI_NAME = "hotfolder";
export const VERSION = "0.3.0";

export const ENV_PREFIX = "HOTFOLDER_";

// suffix and temp extension used for artifacts in the output directory
export const OUTPUT_SUFFIX = "_compressed";
export const PART_EXTENSION = ".part";

// give up looking for a free output name after this many candidates
export const MAX_OUTPUT_NAME_ATTEMPTS = 999;

export const DEFAULT_IGNORE_RULES = ["*.part", "Thumbs.db", "desktop.ini"];

// pause after a scan cycle throws before the next one
export const ERROR_COOLDOWN_MS = 5_000;
