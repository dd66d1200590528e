/**
 * Portfolio Orchestrator
 * 
 * Runs the chart builders in sequence. A failing chart is logged and
 * recorded; the remaining charts still run.
 */

import path from 'path';
import { config } from './config';
import { PORTFOLIO } from './data';
import {
  createHeatmap,
  createNetworkDiagram,
  createRadarChart,
  createSunburst,
  createTimeline,
  createTreemap,
  HEATMAP_FILE,
  NETWORK_FILE,
  RADAR_FILE,
  SUNBURST_FILE,
  TIMELINE_FILE,
  TREEMAP_FILE
} from './charts';
import type { ChartOptions, Figure } from './charts';
import type { PlotlyJsMode } from './config';
import { getNetworkStats } from './graph/connectionGraph';
import type { NetworkStats } from './graph/connectionGraph';
import { loggers, logError } from './logging/logger';
import { AppError, ErrorHandler } from '../shared/errors';
import type { PortfolioData } from './types';

export type VisualizationKind = 'timeline' | 'radar' | 'heatmap' | 'wordcloud' | 'sunburst' | 'network';

export interface VisualizationDefinition {
  kind: VisualizationKind;
  name: string;
  fileName: string;
  /** Part of a full run */
  includeInAll: boolean;
  build: (data: PortfolioData, options: ChartOptions) => Promise<Figure>;
}

export const VISUALIZATIONS: readonly VisualizationDefinition[] = [
  {
    kind: 'timeline',
    name: 'Timeline',
    fileName: TIMELINE_FILE,
    includeInAll: true,
    build: (data, options) => createTimeline(data.roles, options)
  },
  {
    kind: 'radar',
    name: 'Radar Chart',
    fileName: RADAR_FILE,
    includeInAll: true,
    build: (data, options) => createRadarChart(data.skills, options)
  },
  {
    kind: 'heatmap',
    name: 'Heatmap',
    fileName: HEATMAP_FILE,
    includeInAll: true,
    build: (data, options) => createHeatmap(data.skillsByRole, options)
  },
  {
    kind: 'wordcloud',
    name: 'Skills Treemap',
    fileName: TREEMAP_FILE,
    includeInAll: true,
    build: (data, options) => createTreemap(data.skillsWithTools, { ...options, graph: data.connections })
  },
  {
    kind: 'sunburst',
    name: 'Skills Sunburst',
    fileName: SUNBURST_FILE,
    includeInAll: false,
    build: (data, options) => createSunburst(data.skillsWithTools, { ...options, graph: data.connections })
  },
  {
    kind: 'network',
    name: 'Network Diagram',
    fileName: NETWORK_FILE,
    includeInAll: true,
    build: (data, options) => createNetworkDiagram(data.connections.edges, { ...options, graph: data.connections })
  }
];

export const VISUALIZATION_KINDS: readonly VisualizationKind[] = VISUALIZATIONS.map(viz => viz.kind);

export function isVisualizationKind(value: string): value is VisualizationKind {
  return VISUALIZATION_KINDS.some(kind => kind === value);
}

export function getVisualization(kind: VisualizationKind): VisualizationDefinition {
  const definition = VISUALIZATIONS.find(viz => viz.kind === kind);
  if (!definition) {
    throw ErrorHandler.createValidationError(`Unknown visualization "${kind}"`, `Expected one of ${VISUALIZATION_KINDS.join(', ')}`);
  }
  return definition;
}

export type ChartOutcome =
  | { kind: VisualizationKind; name: string; status: 'success'; outputPath: string; figure: Figure }
  | { kind: VisualizationKind; name: string; status: 'error'; error: AppError };

/**
 * Progress callbacks for whoever presents the run
 */
export interface GenerationReporter {
  chartStarted?(definition: VisualizationDefinition): void;
  chartFinished?(outcome: ChartOutcome): void;
}

export interface GenerationOptions {
  show?: boolean;
  outputDir?: string;
  plotlyJs?: PlotlyJsMode;
  currentYear?: number;
  data?: PortfolioData;
  visualizations?: readonly VisualizationDefinition[];
  reporter?: GenerationReporter;
}

export interface GenerationReport {
  outputDir: string;
  results: ChartOutcome[];
  /** Absent when the statistics could not be computed */
  networkStats?: NetworkStats;
  successful: number;
  total: number;
  durationMs: number;
}

function chartOptions(
  definition: VisualizationDefinition,
  options: GenerationOptions,
  outputDir: string
): ChartOptions & { outputPath: string } {
  return {
    outputPath: path.join(outputDir, definition.fileName),
    show: options.show ?? false,
    plotlyJs: options.plotlyJs,
    currentYear: options.currentYear
  };
}

/**
 * Run one builder; errors propagate
 */
export async function generateVisualization(
  kind: VisualizationKind,
  options: GenerationOptions = {}
): Promise<{ outputPath: string; figure: Figure }> {
  const definition = getVisualization(kind);
  const outputDir = path.resolve(options.outputDir ?? config.output.directory);
  const chart = chartOptions(definition, options, outputDir);
  const figure = await definition.build(options.data ?? PORTFOLIO, chart);
  loggers.charts.info({ kind, outputPath: chart.outputPath }, `${definition.name} generated`);
  return { outputPath: chart.outputPath, figure };
}

/**
 * Run every builder of a full run, then the network statistics
 */
export async function generateAllVisualizations(options: GenerationOptions = {}): Promise<GenerationReport> {
  const startTime = Date.now();
  const data = options.data ?? PORTFOLIO;
  const outputDir = path.resolve(options.outputDir ?? config.output.directory);
  const definitions = (options.visualizations ?? VISUALIZATIONS).filter(viz => viz.includeInAll);
  const results: ChartOutcome[] = [];

  for (const definition of definitions) {
    options.reporter?.chartStarted?.(definition);
    const chart = chartOptions(definition, options, outputDir);
    let outcome: ChartOutcome;

    try {
      const figure = await definition.build(data, chart);
      outcome = {
        kind: definition.kind,
        name: definition.name,
        status: 'success',
        outputPath: chart.outputPath,
        figure
      };
      loggers.charts.info({ kind: definition.kind, outputPath: chart.outputPath }, `${definition.name} generated`);
    } catch (error) {
      const appError = ErrorHandler.normalize(error, { chart: definition.kind });
      logError(loggers.charts, appError, `${definition.name} failed`, { kind: definition.kind });
      outcome = { kind: definition.kind, name: definition.name, status: 'error', error: appError };
    }

    results.push(outcome);
    options.reporter?.chartFinished?.(outcome);
  }

  let networkStats: NetworkStats | undefined;
  try {
    networkStats = getNetworkStats(data.connections.edges);
  } catch (error) {
    logError(loggers.graph, ErrorHandler.normalize(error), 'Network statistics failed');
  }

  return {
    outputDir,
    results,
    networkStats,
    successful: results.filter(result => result.status === 'success').length,
    total: definitions.length,
    durationMs: Date.now() - startTime
  };
}
