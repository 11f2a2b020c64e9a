import fs from 'fs';
import { IncgraphErrorCode, ScanError, getErrorMessage } from '../errors/index.js';
import { normalizeName } from './naming.js';

/**
 * `#include "name"` or `#include <name>`, one directive per line.
 */
const INCLUDE_PATTERN = /#include\s+(?:"([^"\r\n]*)"|<([^>\r\n]*)>)/g;

/**
 * Extracts the normalized include targets from C/C++ source text.
 *
 * @returns Target base names (`"util/log.h"` becomes `log`), in order of appearance
 */
export function extractIncludes(content: string): string[] {
  const targets: string[] = [];
  for (const match of content.matchAll(INCLUDE_PATTERN)) {
    const target = match[1] ?? match[2];
    if (target !== undefined) {
      targets.push(normalizeName(target));
    }
  }
  return targets;
}

/**
 * Reads a file and extracts its include targets.
 *
 * Decoding never fails: invalid UTF-8 sequences become replacement
 * characters and extraction runs on whatever text remains.
 *
 * @throws ScanError when the file cannot be read
 */
export function extractIncludesFromFile(filePath: string): string[] {
  let buffer: Buffer;
  try {
    buffer = fs.readFileSync(filePath);
  } catch (error) {
    throw new ScanError(
      `Failed to read ${filePath}: ${getErrorMessage(error)}`,
      filePath,
      IncgraphErrorCode.FILE_NOT_READABLE
    );
  }
  return extractIncludes(decodeLenient(buffer));
}

const lenientDecoder = new TextDecoder('utf-8', { fatal: false });

export function decodeLenient(buffer: Uint8Array): string {
  return lenientDecoder.decode(buffer);
}
