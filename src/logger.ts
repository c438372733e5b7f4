import fs from "fs";
import path from "path";
import { formatTimestamp } from "./format";

export const LOG_LEVELS = ["CRITICAL", "ERROR", "WARNING", "INFO", "DEBUG"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const SEVERITY: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Diagnostic sink used by the scanner and the application flow.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  critical(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Lowest level that is emitted (default INFO) */
  level?: LogLevel;
  /** File every emitted line is appended to; its directory is created */
  logFile?: string;
  /** Clock used for line timestamps */
  now?: () => Date;
}

/**
 * Writes `YYYY-MM-DD HH:MM:SS - LEVEL - message` lines to the console and,
 * when configured, to a log file.
 */
export class ConsoleLogger implements Logger {
  readonly level: LogLevel;
  private readonly logFile?: string;
  private readonly now: () => Date;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? "INFO";
    this.logFile = options.logFile;
    this.now = options.now ?? (() => new Date());

    if (this.logFile) {
      fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
    }
  }

  debug(message: string): void {
    this.write("DEBUG", message);
  }

  info(message: string): void {
    this.write("INFO", message);
  }

  warn(message: string): void {
    this.write("WARNING", message);
  }

  error(message: string): void {
    this.write("ERROR", message);
  }

  critical(message: string): void {
    this.write("CRITICAL", message);
  }

  private write(level: LogLevel, message: string): void {
    if (SEVERITY[level] < SEVERITY[this.level]) {
      return;
    }

    const line = `${formatTimestamp(this.now())} - ${level} - ${message}`;

    switch (level) {
      case "DEBUG":
        console.debug(line);
        break;
      case "INFO":
        console.info(line);
        break;
      case "WARNING":
        console.warn(line);
        break;
      default:
        console.error(line);
    }

    if (this.logFile) {
      fs.appendFileSync(this.logFile, `${line}\n`, "utf8");
    }
  }
}

export const defaultLogger: Logger = new ConsoleLogger();
