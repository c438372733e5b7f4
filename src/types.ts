/**
 * Metadata extracted from a single successfully processed file.
 */
export interface FileRecord {
  /** Absolute path of the file */
  readonly path: string;
  /** Size in bytes */
  readonly size: number;
  /** Extension including the leading dot, or `<no-ext>` */
  readonly extension: string;
  /** Local last-modified time as `YYYY-MM-DD HH:MM:SS` */
  readonly modifiedTime: string;
}

/**
 * Outcome of processing one discovered file.
 * A failed outcome marks a file that existed but could not be processed.
 */
export type ScanOutcome =
  | { ok: true; record: FileRecord }
  | { ok: false; filePath: string; error: string };

/**
 * Running totals for a scan. `discovered` always equals `processed + failed`
 * once a file has been fully handled.
 */
export interface ScanCounters {
  discovered: number;
  processed: number;
  failed: number;
}

/**
 * Snapshot of everything a scan aggregated.
 */
export interface ScanSummary {
  readonly counters: Readonly<ScanCounters>;
  /** Extension to number of processed files carrying it */
  readonly extensionCount: Readonly<Record<string, number>>;
  /** Paths above the large-file threshold, in discovery order */
  readonly largeFiles: readonly string[];
  /** Base name to every full path carrying it, singletons included, in discovery order */
  readonly duplicates: ReadonlyMap<string, readonly string[]>;
}
