import path from 'path';
import { GROUP_NODE_PREFIX } from '../constants.js';
import { normalizeName } from './naming.js';
import type { NodeResolution } from './types.js';

/**
 * Checks whether `target` is `dir` itself or lies inside it.
 *
 * Matching happens at path-segment boundaries: `/src/lib` contains
 * `/src/lib/x.c` but not `/src/lib2/x.c`.
 */
export function isWithinDirectory(target: string, dir: string): boolean {
  if (target === dir) return true;
  const prefix = dir.endsWith(path.sep) ? dir : dir + path.sep;
  return target.startsWith(prefix);
}

/**
 * Node id of the proxy that stands in for every file under `groupDir`,
 * named like a file node: `vendor/fmt.v9` gives `group - fmt`.
 */
export function groupNodeId(groupDir: string): string {
  return GROUP_NODE_PREFIX + normalizeName(groupDir);
}

/**
 * Maps file paths to node ids under a fixed list of group rules.
 *
 * Groups are tried in the order given and the first match wins; overlapping
 * groups are not reported.
 */
export class NodeResolver {
  private readonly groups: readonly string[];

  /**
   * @param groups - Absolute group directory paths
   */
  constructor(groups: readonly string[]) {
    this.groups = groups.map(group => path.resolve(group));
  }

  /**
   * Group directory that owns `target`, if any.
   */
  findGroup(target: string): string | undefined {
    return this.groups.find(group => isWithinDirectory(target, group));
  }

  /**
   * Whether a directory is covered by a group rule, in which case its files
   * are hidden behind the group node and contribute no edges.
   */
  isGrouped(dir: string): boolean {
    return this.findGroup(dir) !== undefined;
  }

  resolve(filePath: string): NodeResolution {
    const group = this.findGroup(filePath);
    if (group !== undefined) {
      return { id: groupNodeId(group), isGroupProxy: true };
    }
    return { id: normalizeName(filePath), isGroupProxy: false };
  }
}
