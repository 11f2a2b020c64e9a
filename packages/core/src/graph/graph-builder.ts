import path from 'path';
import {
  FILE_NODE_COLOR,
  GROUP_NODE_COLOR,
  HEADER_EDGE_COLOR,
  OTHER_EDGE_COLOR,
  SOURCE_EDGE_COLOR,
} from '../constants.js';
import type { GraphConfig } from '../config/schema.js';
import { silentLogger, type Logger } from '../logger.js';
import { extractIncludesFromFile } from './include-extractor.js';
import { detectFileKind, toFileEntry } from './naming.js';
import { NodeResolver } from './node-resolver.js';
import { scanSourceFiles } from './scanner.js';
import type { DependencyGraph, EdgeColor, FileEntry, GraphEdge, GraphNode } from './types.js';

export interface GraphBuilderOptions {
  groups?: readonly string[];   // Absolute group directories, in priority order
  strict?: boolean;             // Passed through to the renderer
  logger?: Logger;
  extractIncludes?: (filePath: string) => string[];
}

function edgeColorFor(entry: FileEntry): EdgeColor {
  switch (detectFileKind(entry.extension)) {
    case 'header':
      return HEADER_EDGE_COLOR;
    case 'source':
      return SOURCE_EDGE_COLOR;
    default:
      return OTHER_EDGE_COLOR;
  }
}

/**
 * Builds the include-dependency graph from a list of discovered files.
 *
 * Every file becomes a node, named by its base name, unless it lies in a
 * group directory, in which case it is folded into that group's node.
 * Edges run from the included node to the including file and are only
 * extracted from files outside groups: a group's internals stay hidden.
 *
 * Nodes are not qualified by directory, so `a/util.h` and `b/util.h`
 * share the node `util`.
 */
export class DependencyGraphBuilder {
  private readonly resolver: NodeResolver;
  private readonly strict: boolean;
  private readonly logger: Logger;
  private readonly extractIncludes: (filePath: string) => string[];

  constructor(options: GraphBuilderOptions = {}) {
    this.resolver = new NodeResolver(options.groups ?? []);
    this.strict = options.strict ?? false;
    this.logger = options.logger ?? silentLogger;
    this.extractIncludes = options.extractIncludes ?? extractIncludesFromFile;
  }

  build(files: readonly string[]): DependencyGraph {
    const entries = files.map(toFileEntry);
    const nodes = new Map<string, GraphNode>();
    const directIds = new Set<string>();
    const proxyByName = new Map<string, string>();

    for (const entry of entries) {
      const { id, isGroupProxy } = this.resolver.resolve(entry.path);
      if (isGroupProxy) {
        proxyByName.set(entry.baseName, id);
      } else {
        directIds.add(id);
      }
      if (!nodes.has(id)) {
        nodes.set(id, {
          id,
          type: isGroupProxy ? 'group' : 'file',
          fillColor: isGroupProxy ? GROUP_NODE_COLOR : FILE_NODE_COLOR,
        });
      }
    }

    const edges: GraphEdge[] = [];
    for (const [dir, members] of this.partitionByDirectory(entries)) {
      if (this.resolver.isGrouped(dir)) {
        this.logger.debug(`Skipping grouped directory ${dir}`);
        continue;
      }
      for (const entry of members) {
        edges.push(...this.edgesFor(entry, directIds, proxyByName));
      }
    }

    return { nodes: [...nodes.values()], edges, strict: this.strict };
  }

  private partitionByDirectory(entries: readonly FileEntry[]): Map<string, FileEntry[]> {
    const byDir = new Map<string, FileEntry[]>();
    for (const entry of entries) {
      const dir = path.dirname(entry.path);
      const members = byDir.get(dir);
      if (members) {
        members.push(entry);
      } else {
        byDir.set(dir, [entry]);
      }
    }
    return byDir;
  }

  private edgesFor(
    entry: FileEntry,
    directIds: ReadonlySet<string>,
    proxyByName: ReadonlyMap<string, string>
  ): GraphEdge[] {
    const node = entry.baseName;
    const color = edgeColorFor(entry);
    const edges: GraphEdge[] = [];

    for (const target of this.extractIncludes(entry.path)) {
      if (target === node) continue;

      const from = directIds.has(target) ? target : proxyByName.get(target);
      if (from === undefined) {
        this.logger.debug(`Unresolved include "${target}" in ${entry.path}`);
        continue;
      }
      edges.push({ from, to: node, color, reversed: true });
    }

    return edges;
  }
}

/**
 * Scans the configured root and builds its dependency graph.
 *
 * @throws ScanError when the tree or one of its files cannot be read
 */
export function buildDependencyGraph(
  config: GraphConfig,
  logger: Logger = silentLogger
): DependencyGraph {
  const files = scanSourceFiles(config.root, config.blacklist);
  logger.debug(`Discovered ${files.length} file(s)`);
  for (const file of files) {
    logger.debug(`  ${path.relative(config.root, file)}`);
  }

  const builder = new DependencyGraphBuilder({
    groups: config.groups,
    strict: config.strict,
    logger,
  });
  return builder.build(files);
}
