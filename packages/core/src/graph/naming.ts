import path from 'path';
import { HEADER_EXTENSIONS, SOURCE_EXTENSIONS } from '../constants.js';
import type { FileEntry, FileKind } from './types.js';

/**
 * Last segment of a path. Both separators are accepted because include
 * targets are written by hand (`"sub\\foo.h"` appears in Windows projects).
 */
function lastSegment(filePath: string): string {
  const segments = filePath.split(/[\\/]/);
  return segments[segments.length - 1];
}

/**
 * Name of the node that represents the file at `filePath`:
 * the filename without its final extension.
 *
 * Used for discovered files and for include targets alike, so that
 * `#include "foo.h"` and `.../foo.h` agree.
 */
export function normalizeName(filePath: string): string {
  const filename = lastSegment(filePath);
  const end = filename.lastIndexOf('.');
  return end === -1 ? filename : filename.slice(0, end);
}

/**
 * Final extension of the file, dot included; '' when there is none.
 */
export function fileExtension(filePath: string): string {
  const filename = lastSegment(filePath);
  const start = filename.lastIndexOf('.');
  return start === -1 ? '' : filename.slice(start);
}

export function isHeaderExtension(extension: string): boolean {
  return HEADER_EXTENSIONS.includes(extension);
}

export function isSourceExtension(extension: string): boolean {
  return SOURCE_EXTENSIONS.includes(extension);
}

export function isWhitelistedExtension(extension: string): boolean {
  return isHeaderExtension(extension) || isSourceExtension(extension);
}

export function detectFileKind(extension: string): FileKind {
  if (isHeaderExtension(extension)) return 'header';
  if (isSourceExtension(extension)) return 'source';
  return 'other';
}

export function toFileEntry(filePath: string): FileEntry {
  const absolute = path.resolve(filePath);
  return Object.freeze({
    path: absolute,
    extension: fileExtension(absolute),
    baseName: normalizeName(absolute),
  });
}
