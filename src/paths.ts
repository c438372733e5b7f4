import fs from "fs";
import path from "path";
import { PathError, errorMessage, isNodeError } from "./errors";

const fsp = fs.promises;

export type ExpectedType = "file" | "dir";

/**
 * Resolves a path against a base directory into an absolute, normalised path.
 * An absolute `relativePath` is returned as-is.
 */
export function resolvePath(basePath: string, relativePath: string): string {
  return path.resolve(basePath, relativePath);
}

async function statOrUndefined(targetPath: string): Promise<fs.Stats | undefined> {
  try {
    return await fsp.stat(targetPath);
  } catch (err) {
    if (isNodeError(err) && err.code === "ENOENT") {
      return undefined;
    }
    throw new PathError(`Cannot access path: ${targetPath}: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Verifies that a path exists and matches the expected type.
 *
 * @param createIfMissing - Create a missing directory (with parents); ignored for files
 * @throws PathError if the path is missing or of the wrong type
 */
export async function ensureExists(
  targetPath: string,
  expectedType: ExpectedType = "file",
  createIfMissing = false
): Promise<true> {
  const stats = await statOrUndefined(targetPath);

  if (expectedType === "dir") {
    if (stats) {
      if (!stats.isDirectory()) {
        throw new PathError(`Expected a directory but found a file: ${targetPath}`);
      }
      return true;
    }
    if (!createIfMissing) {
      throw new PathError(`Directory not found: ${targetPath}`);
    }
    await fsp.mkdir(targetPath, { recursive: true });
    return true;
  }

  if (!stats) {
    throw new PathError(`File not found: ${targetPath}`);
  }
  if (!stats.isFile()) {
    throw new PathError(`Expected a file but found a directory: ${targetPath}`);
  }
  return true;
}
