import { Command, InvalidArgumentError } from "commander";
import { ScanRunOptions } from "./app";
import {
  DEFAULT_CONFIG_PATH,
  DEFAULT_LOG_FILE,
  DEFAULT_REPORT_NAME,
  DEFAULT_REPORTS_DIR,
  VERSION
} from "./config";

export interface CliOptions {
  baseDir: string;
  config: string;
  folder?: string;
  thresholdMb?: number;
  report: string;
  reportsDir: string;
  logFile: string;
  progress: boolean;
  verbose: boolean;
}

export function parseThresholdMb(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Threshold must be a non-negative integer.");
  }
  return Number.parseInt(value, 10);
}

export function toRunOptions(options: CliOptions): ScanRunOptions {
  return {
    baseDir: options.baseDir,
    configPath: options.config,
    folder: options.folder,
    thresholdMb: options.thresholdMb,
    reportName: options.report,
    reportsDir: options.reportsDir,
    logFile: options.logFile,
    progress: options.progress
  };
}

/**
 * Builds the command-line program. `action` receives the parsed options.
 */
export function createProgram(action: (options: CliOptions) => Promise<void>): Command {
  const program = new Command();

  program
    .name("folder-scan")
    .description("Scan a folder and write a Markdown report of its files")
    .version(VERSION)
    .option("--base-dir <dir>", "Directory relative paths resolve against", process.cwd())
    .option("--config <path>", "Path to the JSON config file", DEFAULT_CONFIG_PATH)
    .option("--folder <name>", "Override target folder from config")
    .option("--threshold-mb <mb>", "Override large-file threshold (MB)", parseThresholdMb)
    .option("--report <filename>", "Output report filename", DEFAULT_REPORT_NAME)
    .option("--reports-dir <dir>", "Directory the report is written to", DEFAULT_REPORTS_DIR)
    .option("--log-file <path>", "File log lines are appended to", DEFAULT_LOG_FILE)
    .option("--progress", "Show scan progress on stderr", false)
    .option("--verbose", "Print stack traces on failure", false)
    .action(async (options: CliOptions) => {
      await action(options);
    });

  return program;
}
