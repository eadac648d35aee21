import type { CompiledGraph } from '../types';

/**
 * Pick the node a run begins at.
 *
 * An explicit `startNode` wins. Otherwise the first node, in declaration
 * order, that no unconditional edge points at; when every node is such a
 * target, the first declared node. An empty graph has no start node.
 */
export function resolveStartNode(
  graph: Pick<CompiledGraph, 'nodes' | 'edges' | 'startNode'>
): string | undefined {
  if (graph.startNode !== undefined) {
    return graph.startNode;
  }

  const names = [...graph.nodes.keys()];
  if (names.length === 0) {
    return undefined;
  }

  const targets = new Set(graph.edges.values());
  return names.find((name) => !targets.has(name)) ?? names[0];
}
