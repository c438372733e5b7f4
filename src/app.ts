import path from "path";
import {
  DEFAULT_CONFIG_PATH,
  DEFAULT_LOG_FILE,
  DEFAULT_REPORT_NAME,
  DEFAULT_REPORTS_DIR,
  loadConfig
} from "./config";
import { ConsoleLogger, Logger } from "./logger";
import { ensureExists, resolvePath } from "./paths";
import { createProgressReporter } from "./progress";
import { writeReport } from "./report";
import { FileScanner } from "./scanner";
import { ScanSummary } from "./types";

export interface ScanRunOptions {
  /** Directory every relative path below resolves against */
  baseDir: string;
  configPath?: string;
  /** Overrides `target_folder` from the config */
  folder?: string;
  /** Overrides `large_file_threshold_mb` from the config */
  thresholdMb?: number;
  reportName?: string;
  reportsDir?: string;
  logFile?: string;
  progress?: boolean;
  /** Used instead of a console logger built from the config */
  logger?: Logger;
}

export interface ScanRunResult {
  targetFolder: string;
  reportPath: string;
  summary: ScanSummary;
}

/**
 * Loads the config, scans the target folder and writes the Markdown report.
 *
 * Config and path problems abort before the scan starts; per-file failures
 * are logged and counted.
 */
export async function runScan(options: ScanRunOptions): Promise<ScanRunResult> {
  const baseDir = path.resolve(options.baseDir);
  const loaded = await loadConfig(resolvePath(baseDir, options.configPath ?? DEFAULT_CONFIG_PATH));
  const logFile = resolvePath(baseDir, options.logFile ?? DEFAULT_LOG_FILE);

  const logger =
    options.logger ?? new ConsoleLogger({ level: loaded.config.logLevel, logFile });

  if (loaded.created) {
    logger.info(`Config not found, created default at: ${loaded.configPath}`);
  }
  for (const warning of loaded.warnings) {
    logger.warn(warning);
  }

  logger.debug(`Base dir     : ${baseDir}`);
  logger.debug(`CWD          : ${process.cwd()}`);

  const targetFolder = resolvePath(baseDir, options.folder ?? loaded.config.targetFolder);
  logger.debug(`Target folder: ${targetFolder}`);
  await ensureExists(targetFolder, "dir", true);

  const reportsDir = resolvePath(baseDir, options.reportsDir ?? DEFAULT_REPORTS_DIR);
  const reportName = options.reportName ?? DEFAULT_REPORT_NAME;

  const scanner = new FileScanner(
    targetFolder,
    options.thresholdMb ?? loaded.config.largeFileThresholdMb,
    {
      logger,
      progress: createProgressReporter(options.progress ?? false),
      excludePaths: [logFile, path.resolve(reportsDir, reportName)]
    }
  );

  const summary = await scanner.run((outcome) => {
    if (outcome.ok) {
      logger.info(JSON.stringify(outcome.record));
    }
  });

  scanner.reportDuplicates();
  scanner.reportSummary();

  const reportPath = await writeReport(summary, reportsDir, reportName);
  logger.info(`Report saved : ${reportPath}`);

  return { targetFolder, reportPath, summary };
}
