/**
 * Connection Graph
 * 
 * Builds an undirected graphology graph from the tool/skill edge list,
 * computes a seeded force-directed layout and the centrality metrics
 * reported after generation.
 */

import { UndirectedGraph } from 'graphology';
import { random } from 'graphology-layout';
import forceLayout from 'graphology-layout-force';
import betweennessCentrality from 'graphology-metrics/centrality/betweenness';
import { degreeCentrality } from 'graphology-metrics/centrality/degree';
import { density } from 'graphology-metrics/graph/density';
import seedrandom from 'seedrandom';
import { loggers } from '../logging/logger';
import type { Connection } from '../types';

export interface Position {
  x: number;
  y: number;
}

export interface LayoutOptions {
  seed: number;
  iterations: number;
}

export type RankedNode = [node: string, value: number];

export interface NetworkStats {
  numNodes: number;
  numEdges: number;
  density: number;
  /** Top nodes by degree centrality */
  topConnected: RankedNode[];
  /** Top nodes by betweenness centrality */
  topBridging: RankedNode[];
}

export const DEFAULT_LAYOUT: LayoutOptions = { seed: 42, iterations: 50 };

const TOP_N = 5;

/**
 * Nodes are added in order of first appearance; repeated pairs collapse
 * into one edge. Self-connections keep their node but draw no edge.
 */
export function buildConnectionGraph(connections: readonly Connection[]): UndirectedGraph {
  const graph = new UndirectedGraph();
  for (const [source, target] of connections) {
    graph.mergeNode(source);
    graph.mergeNode(target);
    if (source === target) {
      loggers.graph.warn({ node: source }, `Self-connection skipped: ${source} -> ${target}`);
      continue;
    }
    graph.mergeEdge(source, target);
  }
  return graph;
}

/**
 * Spring-embedded positions. The same seed and iteration count always
 * give the same positions.
 */
export function computeLayout(
  graph: UndirectedGraph,
  options: LayoutOptions = DEFAULT_LAYOUT
): Map<string, Position> {
  const working = graph.copy();
  random.assign(working, { rng: seedrandom(String(options.seed)), center: 0, scale: 2 });
  const mapping = forceLayout(working, { maxIterations: options.iterations });

  const positions = new Map<string, Position>();
  working.forEachNode(node => {
    const position = mapping[node];
    positions.set(node, { x: position.x, y: position.y });
  });
  return positions;
}

/**
 * Top entries by value, descending; ties keep graph insertion order
 */
export function rankNodes(graph: UndirectedGraph, values: Record<string, number>, limit = TOP_N): RankedNode[] {
  return graph
    .nodes()
    .map((node): RankedNode => [node, values[node] ?? 0])
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit);
}

export function getNetworkStats(connections: readonly Connection[]): NetworkStats {
  const graph = buildConnectionGraph(connections);

  return {
    numNodes: graph.order,
    numEdges: graph.size,
    density: density(graph),
    topConnected: rankNodes(graph, degreeCentrality(graph)),
    topBridging: rankNodes(graph, betweennessCentrality(graph))
  };
}
