import fs from "fs";
import path from "path";
import { errorMessage } from "./errors";
import { Logger } from "./logger";

const fsp = fs.promises;

export interface WalkOptions {
  /** Absolute paths that are skipped entirely (files or directories) */
  exclude?: ReadonlySet<string>;
  /** Receives directories that could not be read */
  logger?: Logger;
}

function byName(a: fs.Dirent, b: fs.Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

async function isLinkToDirectory(linkPath: string): Promise<boolean> {
  try {
    return (await fsp.stat(linkPath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Recursively walks a directory tree and yields the absolute path of each file.
 *
 * Entries are visited depth-first in name order, so the sequence is the same on
 * every platform. Symbolic links to directories are never followed; any other
 * link is yielded as a file, even when its target is missing, so the caller's
 * stat decides whether it can be processed. Unreadable directories are logged
 * and skipped.
 *
 * @param rootDir - Absolute path to directory to walk
 *
 * @example
 * for await (const filePath of walkFiles('/path/to/dir')) {
 *   console.log(`Found: ${filePath}`);
 * }
 */
export async function* walkFiles(
  rootDir: string,
  options: WalkOptions = {}
): AsyncGenerator<string, void, undefined> {
  let entries: fs.Dirent[];
  try {
    entries = await fsp.readdir(rootDir, { withFileTypes: true });
  } catch (err) {
    options.logger?.error(`Error reading directory: ${rootDir}: ${errorMessage(err)}`);
    return;
  }

  entries.sort(byName);

  for (const entry of entries) {
    const fullPath = path.join(rootDir, entry.name);

    if (options.exclude?.has(fullPath)) {
      continue;
    }

    // Links to directories are not descended into; links to anything else,
    // dangling ones included, are reported as files.
    if (entry.isSymbolicLink()) {
      if (!(await isLinkToDirectory(fullPath))) {
        yield fullPath;
      }
      continue;
    }

    if (entry.isDirectory()) {
      yield* walkFiles(fullPath, options);
      continue;
    }

    if (entry.isFile()) {
      yield fullPath;
    }
  }
}
