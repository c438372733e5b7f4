/**
 * Error codes used by the scanner.
 * ConfigError and PathError are user-correctable and abort before scanning.
 */
export type ErrorCode = "ConfigError" | "PathError" | "IntegrityError" | "ExtractionError";

export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details */
  details?: Record<string, unknown> | string;
}

/**
 * Base class for every error the scanner raises on purpose.
 *
 * @example
 * throw new ConfigError("Config file is not valid JSON: config/config.json", { cause: err });
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown> | string;
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Configuration file is unreadable, malformed or has fields of the wrong type.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("ConfigError", message, options);
  }
}

/**
 * A path does not exist or is not of the expected type.
 */
export class PathError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("PathError", message, options);
  }
}

/**
 * Scan counters disagree: discovered != processed + failed.
 * Always a bookkeeping bug, never a runtime condition.
 */
export class IntegrityError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("IntegrityError", message, options);
  }
}

/**
 * Metadata extraction was refused for a single file.
 */
export class ExtractionError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("ExtractionError", message, options);
  }
}

export function isUserError(err: unknown): boolean {
  return err instanceof ConfigError || err instanceof PathError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
