/**
 * @incgraph/core - include-dependency graph engine
 *
 * Public API for @incgraph/cli and other consumers.
 *
 * @example
 * ```typescript
 * import { createGraphConfig, buildDependencyGraph } from '@incgraph/core';
 *
 * const config = createGraphConfig({ root: './firmware', group: ['drivers'] });
 * const graph = buildDependencyGraph(config);
 * console.log(graph.nodes.length, graph.edges.length);
 * ```
 */

// =============================================================================
// GRAPH
// =============================================================================

export * from './graph/index.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export { createGraphConfig, resolveOutputPath } from './config/loader.js';
export { GraphOptionsSchema } from './config/schema.js';
export type { GraphConfig, GraphOptions, OutputFormat } from './config/schema.js';

// =============================================================================
// GIT
// =============================================================================

export { autoName, formatTimestamp } from './git/auto-name.js';
export { isGitRepo, describeTags, getShortCommit, isDirty } from './git/utils.js';

// =============================================================================
// ERRORS & LOGGING
// =============================================================================

export {
  IncgraphError,
  IncgraphErrorCode,
  ConfigError,
  ScanError,
  RenderError,
  wrapError,
  isIncgraphError,
  getErrorMessage,
} from './errors/index.js';
export { silentLogger } from './logger.js';
export type { Logger } from './logger.js';

// =============================================================================
// CONSTANTS
// =============================================================================

export * from './constants.js';
