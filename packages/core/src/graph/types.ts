/**
 * Kind of a discovered file, decided by its extension.
 */
export type FileKind = 'header' | 'source' | 'other';

/**
 * A file found by the scanner. Immutable once discovered.
 */
export interface FileEntry {
  readonly path: string;       // Absolute path
  readonly extension: string;  // Final extension including the dot ('.h'), '' when none
  readonly baseName: string;   // Filename without its final extension
}

/**
 * Result of mapping a file path to its node.
 */
export interface NodeResolution {
  id: string;
  isGroupProxy: boolean;
}

export type EdgeColor = 'red' | 'blue' | 'black';

/**
 * Node in the dependency graph
 */
export interface GraphNode {
  id: string;
  type: 'file' | 'group';
  fillColor: `#${string}`;
}

/**
 * Edge in the dependency graph.
 * `from` is the included node and `to` the includer; `reversed` asks the
 * renderer to draw the arrow from the dependency toward its dependent.
 */
export interface GraphEdge {
  from: string;
  to: string;
  color: EdgeColor;
  reversed: boolean;
}

/**
 * Complete include-dependency graph
 */
export interface DependencyGraph {
  nodes: GraphNode[];
  edges: GraphEdge[];
  strict: boolean;  // Renderer should merge multi-edges
}
