import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigError, errorMessage, isNodeError } from "./errors";
import { isLogLevel, LogLevel } from "./logger";

export const VERSION = "1.0.0";

export const DEFAULT_CONFIG_PATH = path.join("config", "config.json");
export const DEFAULT_REPORTS_DIR = "reports";
export const DEFAULT_REPORT_NAME = "scan_report.md";
export const DEFAULT_LOG_FILE = path.join("logs", "app.log");

const fsp = fs.promises;

/**
 * Settings as stored in the JSON config file.
 */
export interface RawConfig {
  target_folder: string;
  large_file_threshold_mb: number;
  log_level: string;
}

/**
 * Validated settings used by the application.
 */
export interface ScanConfig {
  targetFolder: string;
  largeFileThresholdMb: number;
  logLevel: LogLevel;
}

export interface LoadedConfig {
  config: ScanConfig;
  /** Absolute path the config was read from (or created at) */
  configPath: string;
  /** True when the file was missing and has been written with defaults */
  created: boolean;
  /** Problems that were corrected rather than rejected */
  warnings: string[];
}

/**
 * Returns a fresh copy of the default settings.
 */
export function getDefaultConfig(): RawConfig {
  return {
    target_folder: "data",
    large_file_threshold_mb: 10,
    log_level: "DEBUG"
  };
}

const INTEGER_STRING = /^\s*[+-]?\d+\s*$/;

// Numbers are truncated toward zero, integer strings are parsed and booleans
// count as 1 or 0. A negative threshold marks every file as large.
const thresholdSchema = z.preprocess(
  (value) => {
    if (typeof value === "number") return Math.trunc(value);
    if (typeof value === "boolean") return value ? 1 : 0;
    if (typeof value === "string" && INTEGER_STRING.test(value)) return Number.parseInt(value, 10);
    return value;
  },
  z
    .number({ invalid_type_error: "large_file_threshold_mb must be an integer" })
    .int({ message: "large_file_threshold_mb must be an integer" })
);

export const RawConfigSchema = z.object({
  target_folder: z.string({
    required_error: "target_folder is required",
    invalid_type_error: "target_folder must be a string"
  }),
  large_file_threshold_mb: thresholdSchema.default(getDefaultConfig().large_file_threshold_mb),
  log_level: z
    .string({
      required_error: "log_level is required",
      invalid_type_error: "log_level must be a string"
    })
    .transform((level) => level.trim().toUpperCase())
});

/**
 * Loads and validates the JSON config file.
 *
 * A missing file is created (with its directory) from {@link getDefaultConfig}.
 * An unsupported log level falls back to INFO and is reported in `warnings`.
 *
 * @throws ConfigError if the file is not valid JSON or a field has the wrong type
 */
export async function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<LoadedConfig> {
  const absolutePath = path.resolve(configPath);
  await fsp.mkdir(path.dirname(absolutePath), { recursive: true });

  let text: string | undefined;
  try {
    text = await fsp.readFile(absolutePath, "utf8");
  } catch (err) {
    if (!isNodeError(err) || err.code !== "ENOENT") {
      throw new ConfigError(`Cannot read config file: ${absolutePath}: ${errorMessage(err)}`, {
        cause: err
      });
    }
  }

  let raw: unknown;
  const created = text === undefined;
  if (text === undefined) {
    raw = getDefaultConfig();
    await fsp.writeFile(absolutePath, JSON.stringify(raw, null, 2), "utf8");
  } else {
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, {
        cause: err,
        details: errorMessage(err)
      });
    }
  }

  const result = RawConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message).join("; ");
    throw new ConfigError(`Invalid config file ${absolutePath}: ${issues}`, {
      details: issues
    });
  }

  const warnings: string[] = [];
  let logLevel: LogLevel = "INFO";
  if (isLogLevel(result.data.log_level)) {
    logLevel = result.data.log_level;
  } else {
    warnings.push(`Unsupported log_level '${result.data.log_level}'. Falling back to 'INFO'.`);
  }

  return {
    config: {
      targetFolder: result.data.target_folder,
      largeFileThresholdMb: result.data.large_file_threshold_mb,
      logLevel
    },
    configPath: absolutePath,
    created,
    warnings
  };
}
