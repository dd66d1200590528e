/**
 * Skills & Tools Network Diagram
 * 
 * Nodes are skills and tools, edges are practical associations. Positions
 * come from a seeded force-directed layout so reruns draw the same picture.
 */

import { config } from '../config';
import { CONNECTION_GRAPH, TOOL_CONNECTIONS } from '../data';
import { nodeCategory, nodeColor, nodeSize, titleCase } from '../domain/connections';
import { buildConnectionGraph, computeLayout } from '../graph/connectionGraph';
import type { LayoutOptions, Position } from '../graph/connectionGraph';
import { loggers } from '../logging/logger';
import { ErrorHandler } from '../../shared/errors';
import type { Connection, ConnectionGraphData, NodeCategory } from '../types';
import { chartTitle, FONT_FAMILY, TITLE_COLOR } from './figure';
import type { Figure, ScatterTrace } from './figure';
import { exportFigure } from './htmlExport';
import type { ChartOptions } from './options';

export const NETWORK_FILE = 'network.html';

const MAX_LISTED_NEIGHBOURS = 5;

const CATEGORY_NAMES: Readonly<Record<NodeCategory, string>> = {
  language: 'Programming Languages',
  competency: 'Core Competencies',
  data_tool: 'Data Tools',
  viz_tool: 'Visualization Tools',
  ml_tool: 'ML/AI Tools',
  infrastructure: 'Infrastructure'
};

export function markerSize(size: number): number {
  return size * 0.8 + 20;
}

export function networkHoverText(node: string, category: NodeCategory, neighbours: string[]): string {
  let hover = `<b>${node}</b><br>`;
  hover += `Category: ${titleCase(category)}<br>`;
  hover += `Connections: ${neighbours.length}<br>`;
  hover += `Connected to: ${neighbours.slice(0, MAX_LISTED_NEIGHBOURS).join(', ')}`;
  if (neighbours.length > MAX_LISTED_NEIGHBOURS) {
    hover += `... (+${neighbours.length - MAX_LISTED_NEIGHBOURS} more)`;
  }
  return hover;
}

interface CategoryTrace {
  category: NodeCategory;
  color: string;
  x: number[];
  y: number[];
  text: string[];
  sizes: number[];
  hoverTexts: string[];
}

/**
 * Position of a node in a computed layout
 */
export function positionOf(positions: Map<string, Position>, node: string): Position {
  const position = positions.get(node);
  if (!position) {
    throw ErrorHandler.createRenderingError(
      'Failed to draw the network diagram',
      `No layout position for node ${node}`,
      { node }
    );
  }
  return position;
}

export function buildNetworkFigure(
  connections: readonly Connection[],
  graphData: ConnectionGraphData = CONNECTION_GRAPH,
  layout: LayoutOptions = config.layout
): Figure {
  const graph = buildConnectionGraph(connections);
  const positions = computeLayout(graph, layout);
  loggers.graph.debug({ nodes: graph.order, edges: graph.size, ...layout }, 'Layout computed');

  // segments separated by nulls so one trace draws every edge
  const edgeX: (number | null)[] = [];
  const edgeY: (number | null)[] = [];
  graph.forEachEdge((_edge, _attributes, source, target) => {
    const from = positionOf(positions, source);
    const to = positionOf(positions, target);
    edgeX.push(from.x, to.x, null);
    edgeY.push(from.y, to.y, null);
  });

  const edgeTrace: ScatterTrace = {
    type: 'scatter',
    x: edgeX,
    y: edgeY,
    mode: 'lines',
    line: { width: 1, color: '#BDC3C7' },
    hoverinfo: 'none',
    showlegend: false
  };

  const traces = new Map<NodeCategory, CategoryTrace>();
  graph.forEachNode(node => {
    const category = nodeCategory(graphData, node);
    let trace = traces.get(category);
    if (!trace) {
      trace = { category, color: nodeColor(graphData, node), x: [], y: [], text: [], sizes: [], hoverTexts: [] };
      traces.set(category, trace);
    }
    const { x, y } = positionOf(positions, node);
    trace.x.push(x);
    trace.y.push(y);
    trace.text.push(node);
    trace.sizes.push(markerSize(nodeSize(graphData, node)));
    trace.hoverTexts.push(networkHoverText(node, category, graph.neighbors(node)));
  });

  const nodeTraces: ScatterTrace[] = [...traces.values()].map(trace => ({
    type: 'scatter',
    x: trace.x,
    y: trace.y,
    mode: 'markers+text',
    name: CATEGORY_NAMES[trace.category] ?? titleCase(trace.category),
    marker: { size: trace.sizes, color: trace.color, line: { width: 2, color: 'white' } },
    text: trace.text,
    textposition: 'top center',
    textfont: { size: 10, color: TITLE_COLOR, family: 'Arial Black' },
    hovertemplate: '%{customdata}<extra></extra>',
    customdata: trace.hoverTexts
  }));

  const hiddenAxis = { showgrid: false, zeroline: false, showticklabels: false };

  return {
    // edges first so they sit behind the nodes
    data: [edgeTrace, ...nodeTraces],
    layout: {
      title: chartTitle(
        'Skills & Tools Network<br><sub>Connections show how technologies relate in practice</sub>',
        22
      ),
      showlegend: true,
      legend: {
        orientation: 'v',
        yanchor: 'top',
        y: 1,
        xanchor: 'left',
        x: 1.02,
        bgcolor: 'rgba(255, 255, 255, 0.8)',
        bordercolor: '#BDC3C7',
        borderwidth: 1
      },
      hovermode: 'closest',
      paper_bgcolor: 'white',
      plot_bgcolor: 'white',
      height: 800,
      width: 1100,
      margin: { l: 20, r: 200, t: 100, b: 20 },
      xaxis: hiddenAxis,
      yaxis: hiddenAxis,
      font: { family: FONT_FAMILY }
    }
  };
}

export interface NetworkChartOptions extends ChartOptions {
  /** Category, color and size lookups; defaults to the built-in tables */
  graph?: ConnectionGraphData;
  layout?: LayoutOptions;
}

/**
 * Build the network diagram and write it to `network.html`
 */
export async function createNetworkDiagram(
  connections: readonly Connection[] = TOOL_CONNECTIONS,
  options: NetworkChartOptions = {}
): Promise<Figure> {
  const figure = buildNetworkFigure(connections, options.graph, options.layout);
  await exportFigure(figure, NETWORK_FILE, options);
  return figure;
}
