import path from "path";
import { ScanCounters } from "./types";

/**
 * Interface for progress reporting while a folder is scanned.
 */
export interface ProgressReporter {
  /** Called when the walk begins */
  startScanning(rootDir: string): void;

  /** Called after each discovered file has been handled */
  updateScanning(counters: Readonly<ScanCounters>, currentFile: string): void;

  /** Called once the walk is exhausted and the counters verified */
  endScanning(counters: Readonly<ScanCounters>): void;
}

/**
 * Progress reporter that outputs to stderr with throttled updates.
 */
export class StderrProgressReporter implements ProgressReporter {
  private lastUpdate = 0;
  private readonly UPDATE_INTERVAL_MS = 100; // Throttle to 10 updates/sec

  startScanning(rootDir: string): void {
    process.stderr.write(`Scanning ${rootDir}...\n`);
  }

  updateScanning(counters: Readonly<ScanCounters>, currentFile: string): void {
    const now = Date.now();
    if (now - this.lastUpdate < this.UPDATE_INTERVAL_MS) return;
    this.lastUpdate = now;

    const display = `\rFiles: ${counters.discovered} (failed: ${counters.failed}) - ${path.basename(currentFile)}`;

    // Pad with spaces to clear previous line
    process.stderr.write(display + " ".repeat(20));
  }

  endScanning(counters: Readonly<ScanCounters>): void {
    process.stderr.write(
      `\rScan complete: ${counters.discovered} discovered, ${counters.processed} processed, ${counters.failed} failed` +
        " ".repeat(20) +
        "\n"
    );
  }
}

/**
 * No-op progress reporter that produces no output.
 */
export class NoOpProgressReporter implements ProgressReporter {
  startScanning(_rootDir: string): void {}
  updateScanning(_counters: Readonly<ScanCounters>, _currentFile: string): void {}
  endScanning(_counters: Readonly<ScanCounters>): void {}
}

/**
 * Creates a progress reporter based on whether progress should be enabled.
 */
export function createProgressReporter(enabled: boolean): ProgressReporter {
  return enabled ? new StderrProgressReporter() : new NoOpProgressReporter();
}
