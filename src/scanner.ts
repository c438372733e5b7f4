import fs from "fs";
import path from "path";
import { ExtractionError, IntegrityError, errorMessage } from "./errors";
import { formatTimestamp } from "./format";
import { defaultLogger, Logger } from "./logger";
import { NoOpProgressReporter, ProgressReporter } from "./progress";
import { walkFiles } from "./scan";
import { FileRecord, ScanCounters, ScanOutcome, ScanSummary } from "./types";

const fsp = fs.promises;

export const BYTES_PER_MB = 1024 * 1024;
export const DEFAULT_THRESHOLD_MB = 10;
export const NO_EXTENSION = "<no-ext>";

export interface FileScannerOptions {
  logger?: Logger;
  progress?: ProgressReporter;
  /** Absolute paths the walk skips before they are discovered */
  excludePaths?: string[];
}

/**
 * Returns the extension of a file name including its dot, or `<no-ext>`.
 * A leading dot alone (`.bashrc`) is not an extension.
 */
export function extensionOf(filePath: string): string {
  return path.extname(filePath) || NO_EXTENSION;
}

/**
 * Entries of a duplicate index that carry more than one path.
 */
export function duplicateGroups(
  duplicates: ReadonlyMap<string, readonly string[]>
): Array<[string, readonly string[]]> {
  return Array.from(duplicates).filter(([, paths]) => paths.length > 1);
}

/**
 * Walks a folder, extracts metadata for every regular file and aggregates
 * extension counts, large files and base-name collisions.
 *
 * Each file ends up either processed or failed; a failure is logged and
 * reported as a failed outcome without stopping the walk. All state belongs to
 * this instance and accumulates across repeated scans.
 *
 * @example
 * const scanner = new FileScanner('/data', 10);
 * const summary = await scanner.run((outcome) => {
 *   if (outcome.ok) console.log(outcome.record.path);
 * });
 * console.log(summary.counters);
 */
export class FileScanner {
  readonly rootPath: string;
  readonly largeFileThresholdMb: number;
  readonly largeFileThresholdBytes: number;

  protected readonly totals: ScanCounters = { discovered: 0, processed: 0, failed: 0 };
  private readonly extensionCount = new Map<string, number>();
  private readonly largeFiles: string[] = [];
  private readonly nameIndex = new Map<string, string[]>();

  private readonly logger: Logger;
  private readonly progress: ProgressReporter;
  private readonly exclude: ReadonlySet<string>;

  constructor(
    rootPath: string,
    largeFileThresholdMb: number = DEFAULT_THRESHOLD_MB,
    options: FileScannerOptions = {}
  ) {
    this.rootPath = rootPath;
    this.largeFileThresholdMb = largeFileThresholdMb;
    this.largeFileThresholdBytes = largeFileThresholdMb * BYTES_PER_MB;
    this.logger = options.logger ?? defaultLogger;
    this.progress = options.progress ?? new NoOpProgressReporter();
    this.exclude = new Set(options.excludePaths ?? []);
  }

  get counters(): ScanCounters {
    return { ...this.totals };
  }

  /**
   * Walks the root and yields one outcome per discovered file.
   *
   * The counters are verified once the walk is exhausted; a consumer that
   * stops early skips that check, and there is no other way to cancel a walk.
   *
   * @throws IntegrityError if discovered != processed + failed after the walk
   */
  async *scan(): AsyncGenerator<ScanOutcome, void, undefined> {
    this.progress.startScanning(this.rootPath);

    for await (const filePath of walkFiles(this.rootPath, { exclude: this.exclude, logger: this.logger })) {
      this.totals.discovered++;

      let outcome: ScanOutcome;
      try {
        const record = await this.extractMetadata(filePath);
        this.totals.processed++;
        outcome = { ok: true, record };
      } catch (err) {
        this.totals.failed++;
        const message = errorMessage(err);
        this.logger.error(`[FAILED] ${filePath}: ${message}`);
        outcome = { ok: false, filePath, error: message };
      }

      this.progress.updateScanning(this.totals, filePath);
      yield outcome;
    }

    this.verifyCounters();
    this.progress.endScanning(this.totals);
  }

  /**
   * Consumes a full scan and returns the verified summary.
   *
   * @param onOutcome - Awaited for every outcome before the next file is read
   */
  async run(onOutcome?: (outcome: ScanOutcome) => void | Promise<void>): Promise<ScanSummary> {
    for await (const outcome of this.scan()) {
      await onOutcome?.(outcome);
    }
    return this.getSummary();
  }

  /**
   * Extracts metadata for one file and records it in the aggregates.
   *
   * A base name containing "fail" (any case) is rejected before the file is
   * touched. This simulated failure is a test hook, not a heuristic.
   * Aggregates change only once every value has been read.
   */
  async extractMetadata(filePath: string): Promise<FileRecord> {
    const baseName = path.basename(filePath);
    if (baseName.toLowerCase().includes("fail")) {
      throw new ExtractionError("Simulated failure: filename contains 'fail'", {
        details: { filePath }
      });
    }

    const stats = await fsp.stat(filePath);
    const record: FileRecord = {
      path: filePath,
      size: stats.size,
      extension: extensionOf(baseName),
      modifiedTime: formatTimestamp(stats.mtime)
    };

    this.extensionCount.set(record.extension, (this.extensionCount.get(record.extension) ?? 0) + 1);

    if (record.size === 0) {
      this.logger.warn(`Zero-byte file detected: ${filePath}`);
    }

    if (record.size > this.largeFileThresholdBytes) {
      this.logger.warn(
        `Large file (>${this.largeFileThresholdMb} MB): ${filePath} (${record.size} bytes)`
      );
      this.largeFiles.push(filePath);
    }

    const group = this.nameIndex.get(baseName);
    if (group) {
      group.push(filePath);
    } else {
      this.nameIndex.set(baseName, [filePath]);
    }

    return record;
  }

  /**
   * @throws IntegrityError if discovered != processed + failed
   */
  verifyCounters(): void {
    const { discovered, processed, failed } = this.totals;
    if (discovered !== processed + failed) {
      throw new IntegrityError(
        `Counter mismatch: discovered=${discovered}, processed=${processed}, failed=${failed}`,
        { details: { discovered, processed, failed } }
      );
    }
  }

  /**
   * Returns a deep copy of every aggregate after verifying the counters.
   */
  getSummary(): ScanSummary {
    this.verifyCounters();
    return {
      counters: { ...this.totals },
      extensionCount: Object.fromEntries(this.extensionCount),
      largeFiles: [...this.largeFiles],
      duplicates: new Map(
        Array.from(this.nameIndex, ([name, paths]): [string, string[]] => [name, [...paths]])
      )
    };
  }

  reportSummary(): void {
    this.logger.info(`Discovered : ${this.totals.discovered}`);
    this.logger.info(`Processed  : ${this.totals.processed}`);
    this.logger.info(`Failed     : ${this.totals.failed}`);
    for (const [extension, count] of this.extensionCount) {
      this.logger.info(`  ${extension} -> ${count} file(s)`);
    }
    this.logger.info(`Large files: ${this.largeFiles.length}`);
  }

  reportDuplicates(): void {
    for (const [name, paths] of this.nameIndex) {
      if (paths.length > 1) {
        this.logger.info(`Duplicate -> ${name}: ${paths.join(", ")}`);
      }
    }
  }
}
