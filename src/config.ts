import process from "node:process";
import { z } from "zod";

import { LOG_LEVELS, type LogLevel } from "./logger.js";

/** Default number of bytes requested from the file per read. */
export const DEFAULT_CHUNK_BYTES = 64 * 1024;
/** Default number of elements between two progress log entries. */
export const DEFAULT_PROGRESS_INTERVAL = 100_000;

/** Settings consumed by the loader and the CLI. */
export interface WordNetConfig {
  /** Default document path used by the CLI when no positional argument is given. */
  readonly sourcePath: string | null;
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
  readonly chunkBytes: number;
  /** `0` disables progress logging. */
  readonly progressInterval: number;
}

/** Thrown when one or more environment variables hold unusable values. */
export class ConfigError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Blank values count as unset, mirroring how operators clear variables in shells. */
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === undefined || value.length === 0 ? null : value));

function integerVariable(defaultValue: number, min: number, max: number) {
  return z
    .string()
    .trim()
    .optional()
    .transform((value) => (value === undefined || value.length === 0 ? String(defaultValue) : value))
    .pipe(z.string().regex(/^\d+$/, "expected a non-negative integer"))
    .transform((value) => Number.parseInt(value, 10))
    .pipe(z.number().int().min(min).max(max));
}

const logLevelVariable = z
  .string()
  .trim()
  .toLowerCase()
  .optional()
  .transform((value) => (value === undefined || value.length === 0 ? "info" : value))
  .pipe(z.enum(LOG_LEVELS));

const envSchema = z.object({
  PLWN_SOURCE: optionalText,
  PLWN_LOG_LEVEL: logLevelVariable,
  PLWN_LOG_FILE: optionalText,
  PLWN_CHUNK_BYTES: integerVariable(DEFAULT_CHUNK_BYTES, 1024, 16 * 1024 * 1024),
  PLWN_PROGRESS_INTERVAL: integerVariable(DEFAULT_PROGRESS_INTERVAL, 0, Number.MAX_SAFE_INTEGER),
});

/**
 * Reads the configuration from environment variables. Unset variables fall
 * back to their defaults; set but invalid ones raise a {@link ConfigError}
 * naming every offending variable.
 */
export function loadConfig(env: Readonly<Record<string, string | undefined>> = process.env): WordNetConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const values = parsed.data;
  return {
    sourcePath: values.PLWN_SOURCE,
    logLevel: values.PLWN_LOG_LEVEL,
    logFile: values.PLWN_LOG_FILE,
    chunkBytes: values.PLWN_CHUNK_BYTES,
    progressInterval: values.PLWN_PROGRESS_INTERVAL,
  };
}
