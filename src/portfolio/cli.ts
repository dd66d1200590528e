#!/usr/bin/env node
/**
 * Portfolio Visualization CLI
 * 
 * Usage:
 *   portfolio-viz                  # every chart
 *   portfolio-viz --viz radar      # a single chart
 *   portfolio-viz --show           # open the charts in the browser
 *   portfolio-viz --validate       # data-quality checks only
 */

import { parseArgs } from 'util';
import { config } from './config';
import { PORTFOLIO } from './data';
import { careerSpan } from './domain/experience';
import { loggers, serializeError } from './logging/logger';
import {
  generateAllVisualizations,
  generateVisualization,
  getVisualization,
  isVisualizationKind,
  VISUALIZATION_KINDS
} from './orchestrator';
import type { ChartOutcome, GenerationReport, VisualizationKind } from './orchestrator';
import { validatePortfolio } from './validation';
import type { PortfolioValidationResult } from './validation';
import { ErrorHandler, ErrorLogger } from '../shared/errors';
import type { ErrorInfo } from '../shared/errors';

export const USAGE = [
  'Usage: portfolio-viz [options]',
  '',
  'Options:',
  `  --viz <name>   ${[...VISUALIZATION_KINDS, 'all'].join(' | ')} (default: all)`,
  '  --show         Open the generated charts in the browser',
  '  --validate     Run the data-quality checks only',
  '  -h, --help     Show this help'
].join('\n');

export interface CliOptions {
  viz: VisualizationKind | 'all';
  show: boolean;
  validateOnly: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      viz: { type: 'string', default: 'all' },
      show: { type: 'boolean', default: false },
      validate: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false }
    },
    strict: true,
    allowPositionals: false
  });
}

/**
 * @throws CliUsageError on unknown flags or an unknown --viz value
 */
export function parseCliArgs(argv: string[]): CliOptions {
  let values: ReturnType<typeof readArgs>['values'];
  try {
    values = readArgs(argv).values;
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }

  const viz = values.viz ?? 'all';
  if (viz !== 'all' && !isVisualizationKind(viz)) {
    throw new CliUsageError(`Unknown visualization "${viz}"`);
  }

  return {
    viz,
    show: values.show ?? false,
    validateOnly: values.validate ?? false,
    help: values.help ?? false
  };
}

type Print = (line?: string) => void;

const RULE = '='.repeat(60);

function heading(print: Print, title: string): void {
  print(RULE);
  print(title);
  print(RULE);
}

export function printValidation(print: Print, result: PortfolioValidationResult): void {
  if (result.isValid) {
    print('✓ Portfolio data passed all checks');
  } else {
    print(`✗ Portfolio data has ${result.errors.length} problem(s):`);
    for (const error of result.errors) {
      print(`  • ${error.field}: ${error.message}`);
    }
  }
  for (const warning of result.warnings) {
    print(`  ! ${warning}`);
  }
}

export function printNetworkStats(print: Print, report: GenerationReport): void {
  heading(print, 'Network Analysis');
  const stats = report.networkStats;
  if (!stats) {
    print('Network statistics unavailable');
    return;
  }
  print();
  print(`Total Skills/Tools: ${stats.numNodes}`);
  print(`Connections: ${stats.numEdges}`);
  print(`Network Density: ${stats.density.toFixed(3)}`);
  print();
  print('Most Connected Skills:');
  for (const [skill, centrality] of stats.topConnected.slice(0, 3)) {
    print(`  • ${skill}: ${centrality.toFixed(3)}`);
  }
  print();
  print('Key Bridging Skills (connecting different domains):');
  for (const [skill, centrality] of stats.topBridging.slice(0, 3)) {
    print(`  • ${skill}: ${centrality.toFixed(3)}`);
  }
}

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * "YYYY-MM-DD HH:MM:SS" in local time
 */
export function formatLocalTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

function errorLine(error: ErrorInfo): string {
  const details = error.technicalDetails ? ` (${error.technicalDetails})` : '';
  return `  • [${error.category}] ${error.userMessage}${details}`;
}

export function printSummary(
  print: Print,
  report: GenerationReport,
  finishedAt: Date,
  errors: readonly ErrorInfo[] = []
): void {
  heading(print, 'Generation Summary');
  print();
  print(`Completed: ${report.successful}/${report.total} visualizations`);
  print(`Duration: ${(report.durationMs / 1000).toFixed(2)} seconds`);
  print(`Generated: ${formatLocalTimestamp(finishedAt)}`);
  if (errors.length > 0) {
    print();
    print(`Errors (${errors.length}):`);
    for (const error of errors) {
      print(errorLine(error));
    }
  }
  print();
  print(`View visualizations in: ${report.outputDir}`);
}

function outcomeLine(outcome: ChartOutcome): string {
  return outcome.status === 'success'
    ? '✓ Done'
    : `✗ Error: ${ErrorHandler.getUserMessage(outcome.error)}`;
}

/**
 * Entry point. Resolves to the process exit status.
 */
export async function runCli(
  argv: string[] = process.argv.slice(2),
  print: Print = line => console.log(line ?? '')
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      print(`Error: ${error.message}`);
      print(USAGE);
      return 2;
    }
    throw error;
  }

  if (options.help) {
    print(USAGE);
    return 0;
  }

  const validation = validatePortfolio(PORTFOLIO, { currentYear: new Date().getFullYear() });
  loggers.data.info(
    { errors: validation.errors.length, warnings: validation.warnings.length },
    'Portfolio data validated'
  );
  for (const warning of validation.warnings) {
    loggers.data.warn(warning);
  }

  if (options.validateOnly) {
    printValidation(print, validation);
    return validation.isValid ? 0 : 1;
  }

  if (!validation.isValid) {
    printValidation(print, validation);
    print();
  }

  if (options.viz !== 'all') {
    const { name } = getVisualization(options.viz);
    print(`Generating ${name}...`);
    const { outputPath } = await generateVisualization(options.viz, { show: options.show });
    print(`✓ ${name} generated successfully`);
    print(`  ${outputPath}`);
    return 0;
  }

  heading(print, 'Portfolio Visualization Generator');
  print();
  print(`Data: ${PORTFOLIO.metadata.source} (last updated ${PORTFOLIO.metadata.lastUpdated})`);
  print(`Career: ${PORTFOLIO.roles.length} roles over ${careerSpan(PORTFOLIO.roles, new Date().getFullYear())} years`);
  print(`Output directory: ${config.output.directory}`);
  print();

  ErrorLogger.clearLogs();
  const report = await generateAllVisualizations({
    show: options.show,
    reporter: {
      chartFinished: outcome => print(`Generating ${outcome.name}... ${outcomeLine(outcome)}`)
    }
  });

  print();
  printNetworkStats(print, report);
  print();
  printSummary(print, report, new Date(), ErrorLogger.getLogs());
  print();

  // failed charts are reported above; the run itself still succeeds
  return 0;
}

if (require.main === module) {
  runCli()
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      loggers.cli.fatal({ err: serializeError(error) }, 'Portfolio generation failed');
      console.error(ErrorHandler.getUserMessage(error));
      process.exitCode = 1;
    });
}
