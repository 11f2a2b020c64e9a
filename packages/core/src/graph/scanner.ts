import fs from 'fs';
import path from 'path';
import { ScanError, getErrorMessage } from '../errors/index.js';
import { fileExtension, isWhitelistedExtension } from './naming.js';

/**
 * Recursively lists the C/C++ files under `rootDir`.
 *
 * Directories whose absolute path is in `blacklist` are skipped before
 * descending, together with their whole subtree. Symbolic links are
 * followed. Files outside the extension whitelist are left out; a dangling
 * link with a whitelisted name is listed and fails when it is read.
 *
 * @param rootDir - Directory to scan
 * @param blacklist - Absolute directory paths to exclude
 * @returns Absolute file paths, in directory listing order
 * @throws ScanError on any filesystem failure; no partial result is returned
 */
export function scanSourceFiles(rootDir: string, blacklist: Iterable<string> = []): string[] {
  const excluded = new Set(Array.from(blacklist, dir => path.resolve(dir)));
  const files: string[] = [];
  walk(path.resolve(rootDir), excluded, files);
  return files;
}

function walk(dir: string, excluded: ReadonlySet<string>, files: string[]): void {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    throw new ScanError(`Failed to read directory ${dir}: ${getErrorMessage(error)}`, dir);
  }

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);

    if (isDirectory(entry, entryPath)) {
      if (!excluded.has(entryPath)) {
        walk(entryPath, excluded, files);
      }
    } else if (isWhitelistedExtension(fileExtension(entry.name))) {
      files.push(entryPath);
    }
  }
}

function isDanglingLink(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * A dangling link counts as a file and goes through the extension filter;
 * link loops and permission failures are fatal.
 */
function isDirectory(entry: fs.Dirent, entryPath: string): boolean {
  if (!entry.isSymbolicLink()) {
    return entry.isDirectory();
  }
  try {
    return fs.statSync(entryPath).isDirectory();
  } catch (error) {
    if (isDanglingLink(error)) {
      return false;
    }
    throw new ScanError(`Failed to resolve link ${entryPath}: ${getErrorMessage(error)}`, entryPath);
  }
}
