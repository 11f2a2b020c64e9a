import { spawn } from 'child_process';
import fs from 'fs/promises';
import path from 'path';
import { RenderError, type DependencyGraph, type GraphEdge, type OutputFormat } from '@incgraph/core';

export interface RenderOptions {
  outputPath: string;   // Without extension
  format: OutputFormat;
}

/**
 * Escape string for a quoted DOT id
 */
function escapeDotString(str: string): string {
  return str
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n');
}

function quote(id: string): string {
  return `"${escapeDotString(id)}"`;
}

/**
 * Reversed edges are written the way the include reads (includer -> included)
 * with `dir=back`, so the arrowhead sits on the includer.
 */
function edgeLine(edge: GraphEdge): string {
  return edge.reversed
    ? `  ${quote(edge.to)} -> ${quote(edge.from)} [color=${edge.color} dir=back];`
    : `  ${quote(edge.from)} -> ${quote(edge.to)} [color=${edge.color}];`;
}

/**
 * Serializes a dependency graph as DOT source.
 *
 * @throws RenderError if an edge references a node missing from the graph
 */
export function toDot(graph: DependencyGraph): string {
  const ids = new Set(graph.nodes.map(node => node.id));

  const lines: string[] = [
    `${graph.strict ? 'strict ' : ''}digraph "dependencies" {`,
  ];

  for (const node of graph.nodes) {
    lines.push(`  ${quote(node.id)} [color="${node.fillColor}" style=filled];`);
  }

  for (const edge of graph.edges) {
    for (const id of [edge.from, edge.to]) {
      if (!ids.has(id)) {
        throw new RenderError(`Edge references unknown node "${id}"`, { node: id });
      }
    }
    lines.push(edgeLine(edge));
  }

  lines.push('}');

  return lines.join('\n');
}

/**
 * Renders the graph with the Graphviz `dot` executable.
 *
 * @returns Path of the written image
 * @throws RenderError if dot is missing or exits with an error
 */
export async function renderGraph(graph: DependencyGraph, options: RenderOptions): Promise<string> {
  const target = `${options.outputPath}.${options.format}`;
  const source = toDot(graph);

  await fs.mkdir(path.dirname(target), { recursive: true });

  await new Promise<void>((resolve, reject) => {
    const child = spawn('dot', [`-T${options.format}`, '-o', target], {
      stdio: ['pipe', 'ignore', 'pipe'],
    });

    let stderr = '';
    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      const message = error.code === 'ENOENT'
        ? 'Graphviz "dot" executable not found. Install Graphviz and make sure dot is on PATH.'
        : `Failed to run dot: ${error.message}`;
      reject(new RenderError(message, { target }));
    });

    child.on('close', (code: number | null) => {
      if (code === 0) {
        resolve();
      } else {
        reject(new RenderError(`dot exited with code ${code}: ${stderr.trim()}`, { target, code }));
      }
    });

    child.stdin.on('error', (error: Error) => {
      reject(new RenderError(`Failed to write to dot: ${error.message}`, { target }));
    });
    child.stdin.end(source);
  });

  return target;
}
