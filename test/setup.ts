import fs from 'fs';
import path from 'path';
import os from 'os';
import { Logger, LogLevel } from '../src/logger';

/**
 * Creates an isolated temporary directory for testing.
 * Returns the absolute path to the temp directory.
 */
export async function createTempDir(prefix = 'folder-scan-test-'): Promise<string> {
  const tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
  // Resolve /tmp symlinks (macOS) so paths compare equal to what the walker yields
  return fs.promises.realpath(tmpDir);
}

/**
 * Recursively removes a directory and all its contents.
 */
export async function cleanupTempDir(dirPath: string): Promise<void> {
  try {
    await fs.promises.rm(dirPath, { recursive: true, force: true });
  } catch (err) {
    console.warn(`Failed to cleanup temp dir ${dirPath}:`, err);
  }
}

/**
 * Creates a file with specified content at the given path.
 * Creates parent directories if they don't exist.
 */
export async function createTestFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.promises.mkdir(dir, { recursive: true });
  await fs.promises.writeFile(filePath, content);
}

/**
 * Creates a file of exactly `size` bytes.
 */
export async function createSizedFile(filePath: string, size: number): Promise<void> {
  await createTestFile(filePath, Buffer.alloc(size, 0x61));
}

/**
 * Creates a symbolic link at linkPath pointing to targetPath.
 */
export async function createSymlink(
  targetPath: string,
  linkPath: string
): Promise<void> {
  await fs.promises.symlink(targetPath, linkPath);
}

/**
 * Builds the mixed tree used by several suites:
 *
 * - a.txt (5 bytes)
 * - b.txt (5 bytes)
 * - big.bin (1 MB + 1 byte, above a 1 MB threshold)
 * - fail_me.log (simulated failure)
 * - nested/b.txt (name collision with b.txt)
 */
export async function createScanStructure(baseDir: string): Promise<{
  a: string;
  b: string;
  nestedB: string;
  big: string;
  failing: string;
}> {
  const a = path.join(baseDir, 'a.txt');
  const b = path.join(baseDir, 'b.txt');
  const nestedB = path.join(baseDir, 'nested', 'b.txt');
  const big = path.join(baseDir, 'big.bin');
  const failing = path.join(baseDir, 'fail_me.log');

  await createTestFile(a, 'hello');
  await createTestFile(b, 'world');
  await createTestFile(nestedB, 'again');
  await createSizedFile(big, 1024 * 1024 + 1);
  await createTestFile(failing, 'never read');

  return { a, b, nestedB, big, failing };
}

export interface LogEntry {
  level: LogLevel;
  message: string;
}

/**
 * Logger that keeps every line in memory.
 */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string): void {
    this.entries.push({ level: 'DEBUG', message });
  }

  info(message: string): void {
    this.entries.push({ level: 'INFO', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'WARNING', message });
  }

  error(message: string): void {
    this.entries.push({ level: 'ERROR', message });
  }

  critical(message: string): void {
    this.entries.push({ level: 'CRITICAL', message });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}
