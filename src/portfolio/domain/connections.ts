/**
 * Connection graph lookups
 */

import type { ConnectionGraphData, NodeCategory } from '../types';

export const DEFAULT_NODE_CATEGORY: NodeCategory = 'competency';
export const DEFAULT_NODE_COLOR = '#999999';
export const DEFAULT_NODE_SIZE = 50;

export function nodeCategory(graph: ConnectionGraphData, node: string): NodeCategory {
  return graph.nodeCategories[node] ?? DEFAULT_NODE_CATEGORY;
}

/**
 * Color of the node's category
 */
export function nodeColor(graph: ConnectionGraphData, node: string): string {
  return graph.categoryColors[nodeCategory(graph, node)] ?? DEFAULT_NODE_COLOR;
}

export function nodeSize(graph: ConnectionGraphData, node: string): number {
  return graph.nodeSizes[node] ?? DEFAULT_NODE_SIZE;
}

/**
 * Distinct node names in order of first appearance in the edge list
 */
export function connectionNodes(graph: Pick<ConnectionGraphData, 'edges'>): string[] {
  const seen = new Set<string>();
  for (const [source, target] of graph.edges) {
    seen.add(source);
    seen.add(target);
  }
  return [...seen];
}

/**
 * "data_tool" -> "Data Tool"
 */
export function titleCase(tag: string): string {
  return tag
    .split('_')
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}
