import type { StringGraph } from './types';

function escapeLabel(label: string): string {
  return label.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/**
 * Serialize a string graph to Graphviz DOT. Resources are drawn as
 * ellipses and passes as boxes.
 */
export function toDot(graph: StringGraph, name = 'frame_graph'): string {
  const lines = [`digraph ${name} {`];

  for (const vertex of graph.vertices) {
    const shape = vertex.kind === 'pass' ? 'box' : 'ellipse';
    lines.push(`  v${vertex.id} [label="${escapeLabel(vertex.label)}", shape=${shape}];`);
  }
  for (const [from, to] of graph.edges) {
    lines.push(`  v${from} -> v${to};`);
  }

  lines.push('}');
  return lines.join('\n');
}
