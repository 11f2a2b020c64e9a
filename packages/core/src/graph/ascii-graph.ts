import type { DependencyGraph, GraphNode } from './types.js';

const MAX_LABEL_LENGTH = 60;

/**
 * Renders a dependency graph as an ASCII tree.
 *
 * Each root is a node nothing points at; below it are the files that
 * include it, then the files that include those, and so on. A node that
 * was already expanded is printed again with a `(see above)` marker
 * instead of its subtree, which also cuts include cycles.
 */
export class AsciiGraphRenderer {
  render(graph: DependencyGraph): string {
    if (graph.nodes.length === 0) {
      return `(empty graph)`;
    }

    const byId = new Map(graph.nodes.map(node => [node.id, node] as const));

    // Build adjacency list (children of each node), merging multi-edges
    const children = new Map<string, GraphNode[]>();
    const nodesWithIncoming = new Set<string>();
    for (const edge of graph.edges) {
      const parent = byId.get(edge.from);
      const child = byId.get(edge.to);
      if (!parent || !child) continue;
      nodesWithIncoming.add(child.id);
      const existing = children.get(parent.id) ?? [];
      if (!existing.includes(child)) {
        existing.push(child);
        children.set(parent.id, existing);
      }
    }

    const rootNodes = graph.nodes.filter(n => !nodesWithIncoming.has(n.id));
    // Pure cycles have no root; start from the first node
    if (rootNodes.length === 0) {
      rootNodes.push(graph.nodes[0]);
    }

    const lines: string[] = [];
    const expanded = new Set<string>();
    for (let i = 0; i < rootNodes.length; i++) {
      const isLastRoot = i === rootNodes.length - 1;
      this.renderNode(rootNodes[i], children, expanded, lines, '', isLastRoot);
    }

    // Nodes only reachable through a cycle that no root leads into
    for (const node of graph.nodes) {
      if (!expanded.has(node.id)) {
        this.renderNode(node, children, expanded, lines, '', true);
      }
    }

    return lines.join('\n');
  }

  private renderNode(
    node: GraphNode,
    children: Map<string, GraphNode[]>,
    expanded: Set<string>,
    lines: string[],
    prefix: string,
    isLast: boolean
  ): void {
    let label = node.type === 'group' ? `[group] ${node.id}` : node.id;
    if (label.length > MAX_LABEL_LENGTH) {
      label = '...' + label.slice(-(MAX_LABEL_LENGTH - 3));
    }

    const connector = isLast ? '└─' : '├─';
    const nodeChildren = children.get(node.id) ?? [];

    if (expanded.has(node.id)) {
      const marker = nodeChildren.length > 0 ? ' (see above)' : '';
      lines.push(prefix + connector + ' ' + label + marker);
      return;
    }
    expanded.add(node.id);
    lines.push(prefix + connector + ' ' + label);

    const childPrefix = prefix + (isLast ? '  ' : '│ ');
    for (let i = 0; i < nodeChildren.length; i++) {
      const isLastChild = i === nodeChildren.length - 1;
      this.renderNode(nodeChildren[i], children, expanded, lines, childPrefix, isLastChild);
    }
  }
}
