/**
 * Include-dependency graph construction
 *
 * Scans a C/C++ tree, extracts `#include` directives and assembles the
 * file-level dependency graph, with optional folder grouping.
 */

export type {
  FileKind,
  FileEntry,
  NodeResolution,
  EdgeColor,
  GraphNode,
  GraphEdge,
  DependencyGraph,
} from './types.js';

export { scanSourceFiles } from './scanner.js';
export { extractIncludes, extractIncludesFromFile, decodeLenient } from './include-extractor.js';
export { NodeResolver, groupNodeId, isWithinDirectory } from './node-resolver.js';
export { DependencyGraphBuilder, buildDependencyGraph } from './graph-builder.js';
export type { GraphBuilderOptions } from './graph-builder.js';
export { AsciiGraphRenderer } from './ascii-graph.js';
export { normalizeName, fileExtension, detectFileKind, toFileEntry } from './naming.js';
